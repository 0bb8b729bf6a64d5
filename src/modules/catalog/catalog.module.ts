import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CATALOG_CLIENT, CatalogClient } from './adapters/catalog-client.interface';
import { PhimapiCatalogClient } from './adapters/phimapi.adapter';

@Module({
  providers: [
    {
      provide: CATALOG_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService): CatalogClient =>
        new PhimapiCatalogClient(
          config.getOrThrow<string>('catalog.baseUrl'),
          config.getOrThrow<string>('catalog.listPath'),
          config.getOrThrow<string>('catalog.detailPath'),
          {
            timeoutMs: config.getOrThrow<number>('catalog.timeoutMs'),
            userAgent: config.getOrThrow<string>('catalog.userAgent'),
          },
        ),
    },
  ],
  exports: [CATALOG_CLIENT],
})
export class CatalogModule {}
