import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Test } from '@nestjs/testing';
import { CatalogStore } from '../catalog/catalog.store';
import { CATALOG_CONFIG, CatalogConfig } from '../config/catalog.config';
import { CatalogConfigModule } from '../config/config.module';
import { AddExpenseDto, AddRevenueDto, UpdateSongDto } from './dto';
import { EditorController } from './editor.controller';
import { EditorModule } from './editor.module';

describe('EditorController', () => {
  let root: string;
  let store: CatalogStore;
  let controller: EditorController;

  beforeEach(async () => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-editor-'));
    const config: CatalogConfig = {
      dataDir: path.join(root, 'data'),
      backupsDir: path.join(root, 'backups'),
      ownerActId: 'PARK_BELLEVUE',
      maxBackups: 10,
      port: 0,
    };
    store = new CatalogStore(config.dataDir);
    store.write({
      songs: [
        { song_id: 'S1', act_id: 'PARK_BELLEVUE', title: 'Harbor Lights', status: 'demo' },
        { song_id: 'S2', act_id: 'OTHER', title: 'Elsewhere', status: 'released' },
      ],
    });

    const moduleRef = await Test.createTestingModule({ imports: [CatalogConfigModule, EditorModule] })
      .overrideProvider(CATALOG_CONFIG)
      .useValue(config)
      .compile();
    controller = moduleRef.get(EditorController);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('summarizes the owned catalog', () => {
    expect(controller.summary()).toEqual({
      catalog: { total_songs: 1, by_status: { demo: 1 }, by_act: { PARK_BELLEVUE: 1 } },
      revenue: { total_revenue: 0, total_expenses: 0, net_revenue: 0 },
    });
  });

  it('looks songs up by title and id', () => {
    expect(controller.findByTitle({ title: 'harbor lights' }).song?.song_id).toBe('S1');
    expect(controller.findById('S1').status).toBe('ok');
    expect(controller.findById('S2')).toEqual({ status: 'not_found', message: 'Song not found.' });
  });

  it('updates a song and writes the shared file', () => {
    const dto = Object.assign(new UpdateSongDto(), { status: 'mastered' });

    const result = controller.update('S1', dto);

    expect(result.status).toBe('ok');
    expect(result.song?.status).toBe('mastered');
    expect(store.read().songs.map((song) => [song.song_id, song.status])).toEqual([
      ['S2', 'released'],
      ['S1', 'mastered'],
    ]);
  });

  it('reports an unknown song on update', () => {
    const dto = Object.assign(new UpdateSongDto(), { status: 'mastered' });
    expect(controller.update('missing', dto)).toEqual({ status: 'not_found', message: 'Song not found.' });
  });

  it('records expenses and revenue', () => {
    const expense = Object.assign(new AddExpenseDto(), { amount: 30, category: 'artwork' });
    const revenue = Object.assign(new AddRevenueDto(), { amount: 80, source: 'Sync placement' });

    expect(controller.addExpense('S1', expense).message).toBe('Logged $30 expense for Harbor Lights.');
    expect(controller.addRevenue('S1', revenue).message).toBe('Added $80 revenue for Harbor Lights from Sync placement.');
    expect(controller.summary().revenue).toEqual({ total_revenue: 80, total_expenses: 30, net_revenue: 50 });
  });
});
