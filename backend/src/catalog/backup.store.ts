import fs from 'node:fs';
import path from 'node:path';
import { formatBackupStamp } from '../common/timestamps';
import { serializeCatalog } from './catalog.store';
import { CatalogDocument } from './song.model';

const BACKUP_PATTERN = /^catalog_backup_.*\.json$/;

export class BackupStore {
  constructor(
    readonly backupsDir: string,
    readonly maxBackups = 10,
  ) {}

  /** Backup file names, oldest first. */
  list(): string[] {
    if (!fs.existsSync(this.backupsDir)) {
      return [];
    }
    return fs
      .readdirSync(this.backupsDir)
      .filter((name) => BACKUP_PATTERN.test(name))
      .sort();
  }

  write(document: CatalogDocument, at: Date): string {
    fs.mkdirSync(this.backupsDir, { recursive: true });
    const backupPath = this.freshPath(formatBackupStamp(at));
    fs.writeFileSync(backupPath, serializeCatalog(document), { flag: 'wx' });
    return backupPath;
  }

  // Saves within the same second get `_001`, `_002`...; these sort after the bare stamp.
  private freshPath(stamp: string): string {
    let candidate = path.join(this.backupsDir, `catalog_backup_${stamp}.json`);
    for (let n = 1; fs.existsSync(candidate); n++) {
      candidate = path.join(this.backupsDir, `catalog_backup_${stamp}_${String(n).padStart(3, '0')}.json`);
    }
    return candidate;
  }

  /** Deletes the oldest backups until at most `maxBackups` remain. */
  prune(): string[] {
    const backups = this.list();
    const removed = backups.slice(0, Math.max(0, backups.length - this.maxBackups));
    for (const name of removed) {
      fs.rmSync(path.join(this.backupsDir, name));
    }
    return removed;
  }
}
