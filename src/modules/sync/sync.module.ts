import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { StoreModule } from '../store/store.module';
import { SyncService } from './sync.service';

@Module({
  imports: [CatalogModule, StoreModule],
  providers: [SyncService],
  exports: [SyncService],
})
export class SyncModule {}
