import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { REDIS_CLIENT } from '../store/key-value-store.interface';
import { HealthService } from './health.service';

describe('HealthService', () => {
  const set = jest.fn();
  const get = jest.fn();

  async function createService() {
    const moduleRef = await Test.createTestingModule({
      providers: [
        HealthService,
        { provide: REDIS_CLIENT, useValue: { set, get } },
        { provide: ConfigService, useValue: new ConfigService({ redis: { keyPrefix: 'test:' } }) },
      ],
    }).compile();
    moduleRef.useLogger(false);
    return moduleRef.get(HealthService);
  }

  beforeEach(() => {
    set.mockReset();
    get.mockReset();
  });

  it('reports ok when the sentinel round-trips', async () => {
    set.mockResolvedValue('OK');
    get.mockResolvedValue('{"sentinel":"value"}');

    const report = await (await createService()).check();

    expect(set).toHaveBeenCalledWith('test:health_sentinel', '{"sentinel":"value"}', 'EX', 60);
    expect(report).toEqual({ status: 'ok', store: 'ok' });
  });

  it('reports down when the sentinel value differs', async () => {
    set.mockResolvedValue('OK');
    get.mockResolvedValue(null);

    expect(await (await createService()).check()).toEqual({ status: 'down', store: 'down' });
  });

  it('reports down when the connection fails', async () => {
    set.mockRejectedValue(new Error('ECONNREFUSED'));

    expect(await (await createService()).check()).toEqual({ status: 'down', store: 'down' });
  });
});
