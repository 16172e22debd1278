import { EPISODE_PATTERNS } from '../config/constants';
import { UnparsableEntryError } from './errors';

/**
 * Zero-padded to two digits; seasons or episodes of 100+ keep all their digits.
 */
export function formatEpisodeKey(season: number, episode: number): string {
  return `S${String(season).padStart(2, '0')}E${String(episode).padStart(2, '0')}`;
}

export class EpisodeKey {
  constructor(
    public readonly season: number,
    public readonly episode: number,
  ) {
    if (!Number.isSafeInteger(season) || season < 0 || !Number.isSafeInteger(episode) || episode < 0) {
      throw new RangeError(`Invalid episode key: season=${season}, episode=${episode}`);
    }
  }

  toString(): string {
    return formatEpisodeKey(this.season, this.episode);
  }
}

function toNumber(digits: string, filePath: string): number {
  const value = Number(digits);
  if (!Number.isSafeInteger(value)) {
    throw new UnparsableEntryError(filePath, 'invalid-number');
  }
  return value;
}

/**
 * Extract the episode key from a path.
 *
 * The whole path is scanned, so "Season 05/05 Title.mkv" resolves to S05E05.
 * The last season marker wins, then the first episode marker after it:
 * an explicit E05 / Episode 5, or a bare one or two digit number.
 */
export function parseEpisodeKey(filePath: string): EpisodeKey {
  const seasonMatches = Array.from(filePath.matchAll(EPISODE_PATTERNS.SEASON));
  const seasonMatch = seasonMatches[seasonMatches.length - 1];
  if (!seasonMatch || seasonMatch.index === undefined) {
    throw new UnparsableEntryError(filePath, 'missing-season');
  }

  const episodePattern = new RegExp(EPISODE_PATTERNS.EPISODE.source, EPISODE_PATTERNS.EPISODE.flags);
  episodePattern.lastIndex = seasonMatch.index + seasonMatch[0].length;
  const episodeMatch = episodePattern.exec(filePath);
  if (!episodeMatch) {
    throw new UnparsableEntryError(filePath, 'missing-episode');
  }

  return new EpisodeKey(toNumber(seasonMatch[1], filePath), toNumber(episodeMatch[1], filePath));
}

export function tryParseEpisodeKey(filePath: string): EpisodeKey | null {
  try {
    return parseEpisodeKey(filePath);
  } catch (error) {
    if (error instanceof UnparsableEntryError) {
      return null;
    }
    throw error;
  }
}
