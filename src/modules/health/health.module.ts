import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { HealthService } from './health.service';

@Module({
  imports: [StoreModule],
  providers: [HealthService],
  exports: [HealthService],
})
export class HealthModule {}
