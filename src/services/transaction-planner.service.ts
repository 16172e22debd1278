import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import { EpisodeRecord, Movie, PendingOperation, Show } from '../types/media.types';
import { classifyExtension, isVideoExtension } from '../utils/extension-classifier.util';
import { formatEpisodeKey, parseEpisodeKey } from '../utils/episode-key.util';
import { walkSorted } from '../utils/file-walker.util';
import { sanitizeFileName } from '../utils/sanitize.util';
import {
  AmbiguousMovieSourceError,
  AmbiguousOutputError,
  MetadataMismatchError,
  MissingTargetError,
  UnparsableEntryError,
} from '../utils/errors';

/**
 * Maps an eligible source file to its destination, or null to leave it alone.
 */
export type DestinationBuilder = (source: string, extension: string) => string | null;

export interface PlannerOptions {
  onSkip?: (source: string, error: UnparsableEntryError) => void;
}

export interface MoviePlanOptions {
  requireSingleVideo: boolean;
}

function logSkip(source: string): void {
  console.log(`Skip: ${chalk.yellow(source)}`);
}

/**
 * Explicit target, otherwise the directory that contains the source.
 */
export function resolveTargetRoot(source: string, target?: string): string {
  if (target) {
    return target;
  }

  const resolved = path.resolve(source);
  const parent = path.dirname(resolved);
  if (parent === resolved) {
    throw new MissingTargetError(source);
  }
  return parent;
}

/**
 * One lookup table per run, keyed by the rendered episode key.
 */
export function buildEpisodeMap(show: Show): Map<string, EpisodeRecord> {
  const episodes = new Map<string, EpisodeRecord>();
  for (const season of show.seasons) {
    for (const episode of season.episodes) {
      episodes.set(formatEpisodeKey(season.seasonNumber, episode.episodeNumber), episode);
    }
  }
  return episodes;
}

export class TransactionPlanner {
  private readonly onSkip: (source: string, error: UnparsableEntryError) => void;

  constructor(options: PlannerOptions = {}) {
    this.onSkip = options.onSkip ?? logSkip;
  }

  /**
   * Walk the source in sorted order and pair each eligible file with its destination.
   *
   * Files already in place, or whose destination exists, are left out so re-runs are no-ops.
   * Two sources resolving to one destination abort the whole plan.
   */
  collectOperations(source: string, builder: DestinationBuilder): PendingOperation[] {
    const operations: PendingOperation[] = [];
    const seenDestinations = new Set<string>();

    for (const entry of walkSorted(source)) {
      if (entry.isDirectory) {
        continue;
      }

      const extension = classifyExtension(entry.path);
      if (!extension) {
        continue;
      }

      const destination = builder(entry.path, extension);
      if (destination === null) {
        continue;
      }

      const resolvedDestination = path.resolve(destination);
      if (path.resolve(entry.path) === resolvedDestination || fs.existsSync(destination)) {
        continue;
      }

      if (seenDestinations.has(resolvedDestination)) {
        throw new AmbiguousOutputError(destination);
      }
      seenDestinations.add(resolvedDestination);
      operations.push({ source: entry.path, destination });
    }

    return operations;
  }

  planShow(source: string, target: string | undefined, show: Show): PendingOperation[] {
    const targetRoot = resolveTargetRoot(source, target);
    const episodes = buildEpisodeMap(show);
    const showFolder = sanitizeFileName(`${show.name} (${show.year})`);

    return this.collectOperations(source, (filePath, extension) => {
      let key: string;
      try {
        key = parseEpisodeKey(filePath).toString();
      } catch (error) {
        if (error instanceof UnparsableEntryError) {
          this.onSkip(filePath, error);
          return null;
        }
        throw error;
      }

      const episode = episodes.get(key);
      if (!episode) {
        throw new MetadataMismatchError(key, filePath);
      }

      return path.join(
        targetRoot,
        showFolder,
        `Season ${String(episode.seasonNumber).padStart(2, '0')}`,
        sanitizeFileName(`${show.name} - ${key} - ${episode.name}.${extension}`),
      );
    });
  }

  planMovie(
    source: string,
    target: string | undefined,
    movie: Movie,
    options: MoviePlanOptions,
  ): PendingOperation[] {
    const targetRoot = resolveTargetRoot(source, target);

    if (options.requireSingleVideo) {
      const candidates = this.findVideoFiles(source);
      if (candidates.length !== 1) {
        throw new AmbiguousMovieSourceError(source, candidates);
      }
    }

    const title = `${movie.title} (${movie.year})`;
    const movieFolder = sanitizeFileName(title);

    return this.collectOperations(source, (_filePath, extension) =>
      path.join(targetRoot, movieFolder, sanitizeFileName(`${title}.${extension}`)),
    );
  }

  /**
   * Primary video files under the source; subtitles and other ancillary files don't count.
   */
  findVideoFiles(source: string): string[] {
    return walkSorted(source)
      .filter((entry) => !entry.isDirectory)
      .filter((entry) => {
        const extension = classifyExtension(entry.path);
        return extension !== null && isVideoExtension(extension);
      })
      .map((entry) => entry.path);
  }
}
