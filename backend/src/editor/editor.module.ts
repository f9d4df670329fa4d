import { Module } from '@nestjs/common';
import { CATALOG_CONFIG, CatalogConfig } from '../config/catalog.config';
import { CatalogSession } from './catalog-session';
import { EditorController } from './editor.controller';
import { CATALOG_SESSION, EditorService } from './editor.service';

@Module({
  controllers: [EditorController],
  providers: [
    {
      provide: CATALOG_SESSION,
      inject: [CATALOG_CONFIG],
      useFactory: (config: CatalogConfig) => CatalogSession.fromConfig(config),
    },
    EditorService,
  ],
})
export class EditorModule {}
