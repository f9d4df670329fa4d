import { CatalogDocument, SongRecord } from './song.model';

export function ownedBy(songs: readonly SongRecord[], ownerActId: string): SongRecord[] {
  return songs.filter((song) => song.act_id === ownerActId);
}

export function notOwnedBy(songs: readonly SongRecord[], ownerActId: string): SongRecord[] {
  return songs.filter((song) => song.act_id !== ownerActId);
}

/**
 * Rebuilds the full document: every song of other owners, in file order,
 * followed by `ownedSongs`. The previous copies of the owner's songs in
 * `fullDocument` are dropped. Top-level keys besides `songs` are kept.
 */
export function mergeInto(
  fullDocument: CatalogDocument,
  ownerActId: string,
  ownedSongs: readonly SongRecord[],
): CatalogDocument {
  return {
    ...fullDocument,
    songs: [...notOwnedBy(fullDocument.songs, ownerActId), ...ownedSongs],
  };
}
