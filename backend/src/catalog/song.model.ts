export const SONG_STATUSES = ['idea', 'demo', 'mixing', 'mastered', 'released', 'unknown'] as const;

export type SongStatus = (typeof SONG_STATUSES)[number];

export const DEPLOYMENT_CATEGORIES = ['distribution', 'sync_libraries', 'streaming'] as const;

export type DeploymentCategory = (typeof DEPLOYMENT_CATEGORIES)[number];

/** A platform name, or an object naming it in `platform` (or `name`). */
export type DeploymentEntry = string | Record<string, unknown>;

export interface Deployments {
  distribution?: DeploymentEntry[];
  sync_libraries?: DeploymentEntry[];
  streaming?: DeploymentEntry[];
  [key: string]: unknown;
}

export interface ExpenseEntry {
  date: string;
  amount: number;
  category: string;
  [key: string]: unknown;
}

export interface Revenue {
  total_earned?: number;
  expenses?: ExpenseEntry[];
  [key: string]: unknown;
}

export interface SongDates {
  last_modified?: string;
  [key: string]: unknown;
}

export interface SongRecord {
  song_id: string;
  title?: string;
  artist?: string;
  act_id?: string;
  status?: string;
  legacy_code?: string | null;
  registration?: Record<string, unknown>;
  deployments?: Deployments;
  revenue?: Revenue;
  dates?: SongDates;
  [key: string]: unknown;
}

export interface CatalogDocument {
  songs: SongRecord[];
  [key: string]: unknown;
}

export type SongUpdate = Partial<SongRecord>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSongRecord(value: unknown): value is SongRecord {
  return isRecord(value) && typeof value.song_id === 'string';
}

export function normalizeStatus(status: unknown): SongStatus {
  if (typeof status !== 'string') {
    return 'unknown';
  }
  const label = status.trim().toLowerCase();
  return SONG_STATUSES.find((known) => known === label) ?? 'unknown';
}

export function emptyCatalog(): CatalogDocument {
  return { songs: [] };
}
