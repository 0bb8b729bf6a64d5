import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { HealthService } from './modules/health/health.service';
import { SyncService } from './modules/sync/sync.service';

async function bootstrap(): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'error', 'warn'],
  });
  const logger = new Logger('Bootstrap');

  try {
    const health = await app.get(HealthService).check();
    if (health.store !== 'ok') {
      logger.error('Key-value store unreachable, sync not started');
      return 1;
    }

    const summary = await app.get(SyncService).run();
    return summary.outcome === 'aborted' ? 1 : 0;
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exit(1);
  });
