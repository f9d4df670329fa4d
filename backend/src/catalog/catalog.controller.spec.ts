import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Test } from '@nestjs/testing';
import { CATALOG_CONFIG, CatalogConfig } from '../config/catalog.config';
import { CatalogConfigModule } from '../config/config.module';
import { CatalogController } from './catalog.controller';
import { CatalogModule } from './catalog.module';
import { CatalogStore } from './catalog.store';

describe('CatalogController', () => {
  let root: string;
  let config: CatalogConfig;
  let controller: CatalogController;

  beforeEach(async () => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-api-'));
    config = {
      dataDir: path.join(root, 'data'),
      backupsDir: path.join(root, 'backups'),
      ownerActId: 'PARK_BELLEVUE',
      maxBackups: 10,
      port: 0,
    };
    const moduleRef = await Test.createTestingModule({ imports: [CatalogConfigModule, CatalogModule] })
      .overrideProvider(CATALOG_CONFIG)
      .useValue(config)
      .compile();
    controller = moduleRef.get(CatalogController);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const seed = () =>
    new CatalogStore(config.dataDir).write({
      songs: [
        {
          song_id: 'S1',
          act_id: 'PARK_BELLEVUE',
          title: 'Harbor Lights',
          status: 'demo',
          deployments: { distribution: ['DistroKid'], sync_libraries: [], streaming: ['Spotify'] },
        },
        { song_id: 'S2', act_id: 'OTHER', title: 'Harbor Nights', status: 'demo' },
        {
          song_id: 'S3',
          act_id: 'PARK_BELLEVUE',
          title: 'Night Owl',
          status: 'Released',
          deployments: { streaming: ['Spotify', { platform: 'Tidal' }] },
        },
      ],
    });

  it('serves an empty catalog when the file is missing', () => {
    expect(controller.songs({})).toEqual([]);
    expect(controller.overview()).toEqual({
      total: 0,
      byStatus: {},
      deployments: { distribution: 0, sync_libraries: 0, streaming: 0 },
      platforms: {},
    });
  });

  it('lists owner songs with display filters', () => {
    seed();

    expect(controller.songs({}).map((song) => song.song_id)).toEqual(['S1', 'S3']);
    expect(controller.songs({ status: 'released' }).map((song) => song.song_id)).toEqual(['S3']);
    expect(controller.songs({ title: 'harbor' }).map((song) => song.song_id)).toEqual(['S1']);
  });

  it('serves the derived views', () => {
    seed();

    expect(controller.status()).toEqual({ demo: 1, released: 1 });
    expect(controller.deployments()).toEqual({ distribution: 1, sync_libraries: 0, streaming: 2 });
    expect(controller.platforms()).toEqual({ DistroKid: 1, Spotify: 2, Tidal: 1 });
    expect(controller.overview().total).toBe(2);
  });

  it('reloads the file on every request', () => {
    seed();
    expect(controller.songs({})).toHaveLength(2);

    new CatalogStore(config.dataDir).write({ songs: [{ song_id: 'S9', act_id: 'PARK_BELLEVUE' }] });

    expect(controller.songs({}).map((song) => song.song_id)).toEqual(['S9']);
  });
});
