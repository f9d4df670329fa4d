import { Module } from '@nestjs/common';
import { CatalogModule } from './catalog/catalog.module';
import { CatalogConfigModule } from './config/config.module';
import { EditorModule } from './editor/editor.module';

@Module({
  imports: [CatalogConfigModule, CatalogModule, EditorModule],
})
export class AppModule {}
