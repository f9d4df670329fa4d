import { Logger, LoggerService } from '@nestjs/common';
import { BackupStore } from '../catalog/backup.store';
import { mergeInto, ownedBy } from '../catalog/catalog-merge';
import { CatalogStore } from '../catalog/catalog.store';
import { CatalogDocument, Deployments, SongRecord, SongUpdate, isRecord } from '../catalog/song.model';
import { Clock, formatDay, systemClock } from '../common/timestamps';
import { CatalogConfig } from '../config/catalog.config';

export interface CatalogSessionOptions {
  store: CatalogStore;
  backups: BackupStore;
  ownerActId: string;
  clock?: Clock;
  logger?: LoggerService;
}

export interface EditResult {
  status: 'ok' | 'not_found';
  message?: string;
  song?: SongRecord;
}

export interface CatalogSummary {
  total_songs: number;
  by_status: Record<string, number>;
  by_act: Record<string, number>;
}

export interface RevenueSummary {
  total_revenue: number;
  total_expenses: number;
  net_revenue: number;
}

export function songNotFound(): EditResult {
  return { status: 'not_found', message: 'Song not found.' };
}

// Identity and ownership are fixed for the lifetime of a session.
const LOCKED_FIELDS = new Set(['song_id', 'act_id']);

function amountOf(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function emptyDeployments(): Deployments {
  return { distribution: [], sync_libraries: [], streaming: [] };
}

/**
 * Editing session over one owner's songs in the shared catalog file.
 *
 * Every save rewrites the whole file from the session's snapshot of the
 * other owners' songs plus its own working set. The session assumes it is
 * the only writer: a concurrent save by another session or by the sibling
 * manager is silently overwritten by whichever process saves last. There is
 * no lock.
 */
export class CatalogSession {
  readonly ownerActId: string;

  private readonly store: CatalogStore;
  private readonly backups: BackupStore;
  private readonly clock: Clock;
  private readonly logger: LoggerService;

  // Snapshot of the file as last read or written; never aliases `owned`.
  private full: CatalogDocument;
  private readonly owned: SongRecord[];

  private constructor(options: CatalogSessionOptions, full: CatalogDocument) {
    this.store = options.store;
    this.backups = options.backups;
    this.ownerActId = options.ownerActId;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new Logger(CatalogSession.name);
    this.full = full;
    this.owned = structuredClone(ownedBy(full.songs, this.ownerActId));
    this.warnOnDuplicateIds();
  }

  static open(options: CatalogSessionOptions): CatalogSession {
    return new CatalogSession(options, options.store.read());
  }

  static fromConfig(config: CatalogConfig, logger?: LoggerService): CatalogSession {
    return CatalogSession.open({
      store: new CatalogStore(config.dataDir),
      backups: new BackupStore(config.backupsDir, config.maxBackups),
      ownerActId: config.ownerActId,
      logger,
    });
  }

  get songs(): readonly SongRecord[] {
    return this.owned;
  }

  get catalogPath(): string {
    return this.store.filePath;
  }

  findByTitle(title: string): SongRecord | undefined {
    const wanted = title.toLowerCase();
    return this.owned.find((song) => typeof song.title === 'string' && song.title.toLowerCase() === wanted);
  }

  findById(songId: string): SongRecord | undefined {
    return this.owned.find((song) => song.song_id === songId);
  }

  /**
   * `registration` and `deployments` are merged key by key; every other
   * field is overwritten. Undefined values are ignored, and so are
   * `song_id` and `act_id`.
   */
  updateSong(songId: string, updates: SongUpdate): boolean {
    const song = this.findById(songId);
    if (!song) {
      return false;
    }

    const { registration, deployments, ...fields } = updates;
    if (registration) {
      song.registration = { ...(song.registration ?? {}), ...registration };
    }
    if (deployments) {
      song.deployments = { ...(song.deployments ?? emptyDeployments()), ...deployments };
    }
    for (const [key, value] of Object.entries(fields)) {
      if (LOCKED_FIELDS.has(key)) {
        this.logger.warn(`Ignoring change to ${key} of song ${songId}`);
      } else if (value !== undefined) {
        song[key] = value;
      }
    }
    song.dates = { ...(song.dates ?? {}), last_modified: this.clock().toISOString() };

    this.save();
    return true;
  }

  addExpense(songId: string, amount: number, category: string): EditResult {
    const song = this.findById(songId);
    if (!song) {
      return songNotFound();
    }

    const revenue = (song.revenue ??= { expenses: [], total_earned: 0 });
    const expenses = (revenue.expenses ??= []);
    expenses.push({ date: formatDay(this.clock()), amount, category });

    this.save();
    return { status: 'ok', message: `Logged $${amount} expense for ${song.title}.`, song };
  }

  addRevenue(songId: string, amount: number, source: string): EditResult {
    const song = this.findById(songId);
    if (!song) {
      return songNotFound();
    }

    const revenue = (song.revenue ??= { expenses: [], total_earned: 0 });
    revenue.total_earned = amountOf(revenue.total_earned) + amount;

    this.save();
    return { status: 'ok', message: `Added $${amount} revenue for ${song.title} from ${source}.`, song };
  }

  getCatalogSummary(): CatalogSummary {
    const byStatus: Record<string, number> = {};
    for (const song of this.owned) {
      const status = typeof song.status === 'string' ? song.status : 'unknown';
      byStatus[status] = (byStatus[status] ?? 0) + 1;
    }
    return {
      total_songs: this.owned.length,
      by_status: byStatus,
      by_act: { [this.ownerActId]: this.owned.length },
    };
  }

  getRevenueSummary(): RevenueSummary {
    let total = 0;
    let expenses = 0;
    for (const song of this.owned) {
      total += amountOf(song.revenue?.total_earned);
      const entries = song.revenue?.expenses;
      for (const expense of Array.isArray(entries) ? entries : []) {
        expenses += amountOf(isRecord(expense) ? expense.amount : undefined);
      }
    }
    return { total_revenue: total, total_expenses: expenses, net_revenue: total - expenses };
  }

  /** Backs up the previous file contents, then rewrites the catalog. */
  save(): void {
    try {
      const backupPath = this.backups.write(this.full, this.clock());
      const pruned = this.backups.prune();
      this.logger.debug?.(`Backup written to ${backupPath}, ${pruned.length} pruned`);
    } catch (error) {
      this.logger.warn(`Backup failed, saving anyway: ${error instanceof Error ? error.message : String(error)}`);
    }

    const merged = mergeInto(this.full, this.ownerActId, this.owned);
    this.store.write(merged);
    this.full = structuredClone(merged);
    this.logger.log(`Saved ${merged.songs.length} songs to ${this.store.filePath}`);
  }

  private warnOnDuplicateIds(): void {
    const seen = new Set<string>();
    for (const song of this.owned) {
      if (seen.has(song.song_id)) {
        this.logger.warn(`Duplicate song_id ${song.song_id}; lookups return the first match`);
      }
      seen.add(song.song_id);
    }
  }
}
