import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import catalogConfig from './config/catalog.config';
import redisConfig from './config/redis.config';
import syncConfig from './config/sync.config';
import { validateEnv } from './config/env.validation';
import { HealthModule } from './modules/health/health.module';
import { SyncModule } from './modules/sync/sync.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [catalogConfig, redisConfig, syncConfig],
      validate: validateEnv,
    }),
    HealthModule,
    SyncModule,
  ],
})
export class AppModule {}
