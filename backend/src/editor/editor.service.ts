import { Inject, Injectable } from '@nestjs/common';
import { SongUpdate } from '../catalog/song.model';
import { CatalogSession, CatalogSummary, EditResult, RevenueSummary, songNotFound } from './catalog-session';
import { AddExpenseDto, AddRevenueDto, UpdateSongDto } from './dto';

export const CATALOG_SESSION = Symbol('CATALOG_SESSION');

export interface EditorSummary {
  catalog: CatalogSummary;
  revenue: RevenueSummary;
}

@Injectable()
export class EditorService {
  constructor(@Inject(CATALOG_SESSION) private readonly session: CatalogSession) {}

  summary(): EditorSummary {
    return {
      catalog: this.session.getCatalogSummary(),
      revenue: this.session.getRevenueSummary(),
    };
  }

  findByTitle(title: string): EditResult {
    const song = this.session.findByTitle(title);
    return song ? { status: 'ok', song } : songNotFound();
  }

  findById(songId: string): EditResult {
    const song = this.session.findById(songId);
    return song ? { status: 'ok', song } : songNotFound();
  }

  updateSong(songId: string, dto: UpdateSongDto): EditResult {
    if (!this.session.updateSong(songId, toSongUpdate(dto))) {
      return songNotFound();
    }
    return { status: 'ok', message: 'Song updated.', song: this.session.findById(songId) };
  }

  addExpense(songId: string, dto: AddExpenseDto): EditResult {
    return this.session.addExpense(songId, dto.amount, dto.category);
  }

  addRevenue(songId: string, dto: AddRevenueDto): EditResult {
    return this.session.addRevenue(songId, dto.amount, dto.source);
  }
}

function toSongUpdate(dto: UpdateSongDto): SongUpdate {
  const { deployments, ...fields } = dto;
  return deployments ? { ...fields, deployments: { ...deployments } } : { ...fields };
}
