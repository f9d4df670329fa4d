import fs from 'node:fs';
import path from 'node:path';
import { CatalogDocument, emptyCatalog, isRecord, isSongRecord } from './song.model';

export class CatalogFormatError extends Error {
  constructor(
    readonly filePath: string,
    detail: string,
  ) {
    super(`Malformed catalog ${filePath}: ${detail}`);
    this.name = 'CatalogFormatError';
  }
}

export function parseCatalogDocument(raw: unknown, filePath: string): CatalogDocument {
  if (!isRecord(raw)) {
    throw new CatalogFormatError(filePath, 'document is not a JSON object');
  }
  const songs = raw.songs ?? [];
  if (!Array.isArray(songs)) {
    throw new CatalogFormatError(filePath, '"songs" is not an array');
  }
  const badIndex = songs.findIndex((song) => !isSongRecord(song));
  if (badIndex !== -1) {
    throw new CatalogFormatError(filePath, `songs[${badIndex}] has no string song_id`);
  }
  return { ...raw, songs: songs.filter(isSongRecord) };
}

/** Reads and writes the shared catalog file. */
export class CatalogStore {
  readonly filePath: string;

  constructor(readonly dataDir: string) {
    this.filePath = path.join(dataDir, 'catalog.json');
  }

  /** A missing file is an empty catalog; malformed JSON is fatal. */
  read(): CatalogDocument {
    if (!fs.existsSync(this.filePath)) {
      return emptyCatalog();
    }
    const text = fs.readFileSync(this.filePath, 'utf8');
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new CatalogFormatError(this.filePath, error instanceof Error ? error.message : String(error));
    }
    return parseCatalogDocument(raw, this.filePath);
  }

  write(document: CatalogDocument): void {
    fs.mkdirSync(this.dataDir, { recursive: true });
    fs.writeFileSync(this.filePath, serializeCatalog(document));
  }
}

export function serializeCatalog(document: CatalogDocument): string {
  return JSON.stringify(document, null, 2);
}
