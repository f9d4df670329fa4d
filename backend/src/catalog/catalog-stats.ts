import {
  DEPLOYMENT_CATEGORIES,
  DeploymentCategory,
  DeploymentEntry,
  SongRecord,
  SongStatus,
  isRecord,
  normalizeStatus,
} from './song.model';

export type StatusHistogram = Partial<Record<SongStatus, number>>;

export type DeploymentCoverage = Record<DeploymentCategory, number>;

export interface SongFilter {
  status?: string;
  title?: string;
}

export interface CatalogOverview {
  total: number;
  byStatus: StatusHistogram;
  deployments: DeploymentCoverage;
  platforms: Record<string, number>;
}

export function statusHistogram(songs: readonly SongRecord[]): StatusHistogram {
  const histogram: StatusHistogram = {};
  for (const song of songs) {
    const status = normalizeStatus(song.status);
    histogram[status] = (histogram[status] ?? 0) + 1;
  }
  return histogram;
}

function deploymentList(song: SongRecord, category: DeploymentCategory): DeploymentEntry[] {
  const list = song.deployments?.[category];
  return Array.isArray(list) ? list : [];
}

export function deploymentCoverage(songs: readonly SongRecord[]): DeploymentCoverage {
  const coverage: DeploymentCoverage = { distribution: 0, sync_libraries: 0, streaming: 0 };
  for (const song of songs) {
    for (const category of DEPLOYMENT_CATEGORIES) {
      if (deploymentList(song, category).length > 0) {
        coverage[category] += 1;
      }
    }
  }
  return coverage;
}

export function platformName(entry: unknown): string | null {
  if (typeof entry === 'string') {
    return entry.trim() || null;
  }
  if (!isRecord(entry)) {
    return null;
  }
  const name = entry.platform ?? entry.name;
  return typeof name === 'string' && name.trim() ? name.trim() : null;
}

export function platformCoverage(songs: readonly SongRecord[]): Record<string, number> {
  const coverage: Record<string, number> = {};
  for (const song of songs) {
    const platforms = new Set<string>();
    for (const category of DEPLOYMENT_CATEGORIES) {
      for (const entry of deploymentList(song, category)) {
        const name = platformName(entry);
        if (name) {
          platforms.add(name);
        }
      }
    }
    for (const name of platforms) {
      coverage[name] = (coverage[name] ?? 0) + 1;
    }
  }
  return coverage;
}

export function filterSongs(songs: readonly SongRecord[], filter: SongFilter): SongRecord[] {
  const status = filter.status?.trim().toLowerCase();
  const title = filter.title?.trim().toLowerCase();
  return songs.filter(
    (song) =>
      (!status || normalizeStatus(song.status) === status) &&
      (!title || (song.title ?? '').toLowerCase().includes(title)),
  );
}

export function catalogOverview(songs: readonly SongRecord[]): CatalogOverview {
  return {
    total: songs.length,
    byStatus: statusHistogram(songs),
    deployments: deploymentCoverage(songs),
    platforms: platformCoverage(songs),
  };
}
