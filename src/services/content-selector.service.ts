import chalk from 'chalk';
import { AUTO_DETECT_MAX_DEPTH } from '../config/constants';
import { ContentType, Movie, Show } from '../types/media.types';
import { NoSearchResultsError, OrganizeError } from '../utils/errors';
import { classifyExtension } from '../utils/extension-classifier.util';
import { walkSorted } from '../utils/file-walker.util';
import { detectContentType, extractTitle } from '../utils/title-extractor.util';
import { Prompter } from './prompt.service';
import { TMDbService } from './tmdb.service';

export type SelectedContent = { type: ContentType.Show; show: Show } | { type: ContentType.Movie; movie: Movie };

function formatChoice(name: string, date: string | undefined, id: number, popularity: number | undefined): string {
  const year = date?.split('-')[0] || 'N/A';
  return `${name} (${year}) - ID: ${id} - Popularity: ${(popularity ?? 0).toFixed(1)}`;
}

/**
 * Picks the show or movie to organize when no id was given on the command line.
 */
export class ContentSelectorService {
  constructor(
    private readonly tmdb: TMDbService,
    private readonly prompter: Prompter,
  ) {}

  /**
   * First eligible media file near the top of the source, used to guess type and title.
   */
  findSampleFile(source: string): string {
    const sample = walkSorted(source, AUTO_DETECT_MAX_DEPTH).find(
      (entry) => !entry.isDirectory && classifyExtension(entry.path) !== null,
    );
    if (!sample) {
      throw new OrganizeError(`No video files found in source directory: ${source}`);
    }
    return sample.path;
  }

  async select(source: string): Promise<SelectedContent> {
    const sample = this.findSampleFile(source);
    const detectedType = detectContentType(sample);
    const detectedTitle = extractTitle(sample) ?? '';

    const type = await this.prompter.select(
      'Search for:',
      [
        { name: ContentType.Show, value: ContentType.Show },
        { name: ContentType.Movie, value: ContentType.Movie },
      ],
      detectedType === ContentType.Show ? 0 : 1,
    );

    const title = await this.prompter.input(`${type} Title:`, detectedTitle);

    if (type === ContentType.Show) {
      return { type, show: await this.selectShow(title) };
    }
    return { type, movie: await this.selectMovie(title) };
  }

  async selectShow(query: string): Promise<Show> {
    const { results } = await this.tmdb.searchTv(query);
    if (results.length === 0) {
      throw new NoSearchResultsError(query, 'TV shows');
    }

    const selected = await this.prompter.select(
      'Select a TV show:',
      results.map((result) => ({
        name: formatChoice(result.name, result.firstAirDate, result.id, result.popularity),
        value: result,
      })),
    );
    console.log(`Selected: ${chalk.green(selected.name)} (ID: ${selected.id})`);

    return this.tmdb.getShow(selected.id);
  }

  async selectMovie(query: string): Promise<Movie> {
    const { results } = await this.tmdb.searchMovie(query);
    if (results.length === 0) {
      throw new NoSearchResultsError(query, 'movies');
    }

    const selected = await this.prompter.select(
      'Select a movie:',
      results.map((result) => ({
        name: formatChoice(result.title, result.releaseDate, result.id, result.popularity),
        value: result,
      })),
    );
    console.log(`Selected: ${chalk.green(selected.title)} (ID: ${selected.id})`);

    return this.tmdb.getMovie(selected.id);
  }
}
