import { Module } from '@nestjs/common';
import { CatalogController } from './catalog.controller';
import { CatalogReaderService } from './catalog-reader.service';

@Module({
  controllers: [CatalogController],
  providers: [CatalogReaderService],
  exports: [CatalogReaderService],
})
export class CatalogModule {}
