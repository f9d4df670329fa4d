import { Inject, Injectable } from '@nestjs/common';
import { CATALOG_CONFIG, CatalogConfig } from '../config/catalog.config';
import { ownedBy } from './catalog-merge';
import {
  CatalogOverview,
  DeploymentCoverage,
  SongFilter,
  StatusHistogram,
  catalogOverview,
  deploymentCoverage,
  filterSongs,
  platformCoverage,
  statusHistogram,
} from './catalog-stats';
import { CatalogStore } from './catalog.store';
import { SongRecord } from './song.model';

/** Read-only view of the owner's songs; reloads the file on every call. */
@Injectable()
export class CatalogReaderService {
  private readonly store: CatalogStore;

  constructor(@Inject(CATALOG_CONFIG) private readonly config: CatalogConfig) {
    this.store = new CatalogStore(config.dataDir);
  }

  loadCatalog(): SongRecord[] {
    return ownedBy(this.store.read().songs, this.config.ownerActId);
  }

  listSongs(filter: SongFilter = {}): SongRecord[] {
    return filterSongs(this.loadCatalog(), filter);
  }

  statusHistogram(): StatusHistogram {
    return statusHistogram(this.loadCatalog());
  }

  deploymentCoverage(): DeploymentCoverage {
    return deploymentCoverage(this.loadCatalog());
  }

  platformCoverage(): Record<string, number> {
    return platformCoverage(this.loadCatalog());
  }

  overview(): CatalogOverview {
    return catalogOverview(this.loadCatalog());
  }
}
