import path from 'path';
import { TITLE_METADATA_PATTERNS } from '../config/constants';
import { ContentType } from '../types/media.types';
import { tryParseEpisodeKey } from './episode-key.util';

/**
 * Offset where release metadata begins in a file stem: the earliest match of any pattern.
 * Returns the stem length when nothing matches.
 */
export function findMetadataStart(stem: string): number {
  let start = stem.length;

  for (const { pattern } of TITLE_METADATA_PATTERNS) {
    const match = pattern.exec(stem);
    if (match && match.index < start) {
      start = match.index;
    }
  }

  return start;
}

/**
 * Best-effort human title from a release filename, used to seed the search prompt.
 */
export function extractTitle(filePath: string): string | null {
  const stem = path.parse(filePath).name;
  const title = stem
    .slice(0, findMetadataStart(stem))
    .replace(/[._-]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  return title || null;
}

export function detectContentType(filePath: string): ContentType {
  return tryParseEpisodeKey(filePath) ? ContentType.Show : ContentType.Movie;
}
