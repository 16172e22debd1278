import { TMDB_WEB_URL } from '../config/constants';
import { ContentType, MovieSearchResult, TvSearchResult } from '../types/media.types';
import { TMDbService } from './tmdb.service';

export interface SearchRow {
  id: number;
  type: ContentType;
  name: string;
  language?: string;
  popularity?: number;
  year: string;
  link: string;
}

export interface SearchOptions {
  language?: string;
  minPopularity: number;
}

export interface SearchSummary {
  rows: SearchRow[];
  totalTv: number;
  totalMovies: number;
}

enum MatchClass {
  Exact = 0,
  Prefix = 1,
  Other = 2,
}

export function tvRow(result: TvSearchResult): SearchRow {
  return {
    id: result.id,
    type: ContentType.Show,
    name: result.name,
    language: result.originalLanguage,
    popularity: result.popularity,
    year: result.firstAirDate?.split('-')[0] ?? '',
    link: `${TMDB_WEB_URL}/tv/${result.id}`,
  };
}

export function movieRow(result: MovieSearchResult): SearchRow {
  return {
    id: result.id,
    type: ContentType.Movie,
    name: result.title,
    language: result.originalLanguage,
    popularity: result.popularity,
    year: result.releaseDate?.split('-')[0] ?? '',
    link: `${TMDB_WEB_URL}/movie/${result.id}`,
  };
}

/**
 * Popularity as shown in the results table, one decimal.
 */
export function roundPopularity(popularity: number): number {
  return Number(popularity.toFixed(1));
}

function classify(name: string, query: string): MatchClass {
  const lower = name.toLowerCase();
  if (lower === query) return MatchClass.Exact;
  if (lower.startsWith(query)) return MatchClass.Prefix;
  return MatchClass.Other;
}

/**
 * Filter by language and popularity floor, then order by how well the name matches
 * the query (exact, prefix, other) and popularity descending within each class.
 * Exact title matches are never dropped by the popularity floor.
 */
export function rankSearchResults(rows: SearchRow[], query: string, options: SearchOptions): SearchRow[] {
  const normalizedQuery = query.toLowerCase();

  const filtered = rows.filter((row) => {
    const languageMatch = !options.language || !row.language || row.language === options.language;
    if (!languageMatch) {
      return false;
    }

    if (classify(row.name, normalizedQuery) === MatchClass.Exact) {
      return true;
    }
    return row.popularity !== undefined && roundPopularity(row.popularity) >= options.minPopularity;
  });

  return filtered
    .map((row, index) => ({ row, index, match: classify(row.name, normalizedQuery) }))
    .sort((a, b) => {
      if (a.match !== b.match) return a.match - b.match;
      const popularityDiff = (b.row.popularity ?? 0) - (a.row.popularity ?? 0);
      return popularityDiff !== 0 ? popularityDiff : a.index - b.index;
    })
    .map(({ row }) => row);
}

export class SearchService {
  constructor(private readonly tmdb: TMDbService) {}

  /**
   * TV and movie searches run concurrently; both must succeed.
   */
  async search(query: string, options: SearchOptions): Promise<SearchSummary> {
    const [tv, movies] = await Promise.all([this.tmdb.searchTv(query), this.tmdb.searchMovie(query)]);

    const rows = [...tv.results.map(tvRow), ...movies.results.map(movieRow)];

    return {
      rows: rankSearchResults(rows, query, options),
      totalTv: tv.totalResults,
      totalMovies: movies.totalResults,
    };
  }
}
