import { Controller, Get, Query } from '@nestjs/common';
import { CatalogReaderService } from './catalog-reader.service';
import { ListSongsQueryDto } from './dto';

@Controller('catalog')
export class CatalogController {
  constructor(private readonly reader: CatalogReaderService) {}

  @Get('songs')
  songs(@Query() query: ListSongsQueryDto) {
    return this.reader.listSongs({ status: query.status, title: query.title });
  }

  @Get('overview')
  overview() {
    return this.reader.overview();
  }

  @Get('stats/status')
  status() {
    return this.reader.statusHistogram();
  }

  @Get('stats/deployments')
  deployments() {
    return this.reader.deploymentCoverage();
  }

  @Get('stats/platforms')
  platforms() {
    return this.reader.platformCoverage();
  }
}
