import axios, { AxiosInstance } from 'axios';
import { EnvConfig } from '../config/env.config';
import {
  EpisodeRecord,
  Movie,
  MovieSearchResult,
  SearchPage,
  Season,
  Show,
  TvSearchResult,
} from '../types/media.types';
import { MetadataFetchError } from '../utils/errors';

// TMDb API v3 with a v4 read access token
// Get a token from: https://www.themoviedb.org/settings/api

interface TMDbSeries {
  id: number;
  name: string;
  first_air_date: string | null;
  number_of_episodes: number;
  number_of_seasons: number;
}

interface TMDbEpisode {
  id: number;
  season_number: number;
  episode_number: number;
  name: string;
}

interface TMDbSeason {
  id: number;
  season_number: number;
  name: string;
  air_date: string | null;
  episodes: TMDbEpisode[];
}

interface TMDbMovieDetails {
  id: number;
  title: string;
  release_date: string | null;
}

interface TMDbTVShow {
  id: number;
  name: string;
  first_air_date?: string | null;
  original_language?: string | null;
  popularity?: number | null;
}

interface TMDbMovie {
  id: number;
  title: string;
  release_date?: string | null;
  original_language?: string | null;
  popularity?: number | null;
}

interface TMDbSearchResponse<T> {
  page: number;
  results: T[];
  total_pages: number;
  total_results: number;
}

export type TmdbConfig = Pick<EnvConfig, 'tmdbApiToken' | 'tmdbBaseUrl' | 'tmdbLanguage' | 'requestTimeoutMs'>;

/**
 * Year from a TMDb date ("2008-01-20"), 0 when missing or malformed.
 */
export function yearFromDate(date: string | null | undefined): number {
  const year = parseInt((date ?? '').split('-')[0], 10);
  return Number.isNaN(year) ? 0 : year;
}

function optional<T>(value: T | null | undefined): T | undefined {
  return value === null ? undefined : value;
}

export class TMDbService {
  private readonly http: AxiosInstance;

  /**
   * @param http - preconfigured client; tests pass one with an in-process adapter
   */
  constructor(private readonly config: TmdbConfig, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: config.tmdbBaseUrl,
        timeout: config.requestTimeoutMs,
      });
  }

  /**
   * Series details plus every season page, fetched concurrently.
   */
  async getShow(id: number): Promise<Show> {
    const series = await this.get<TMDbSeries>(`/tv/${id}`);

    const seasonNumbers = Array.from({ length: series.number_of_seasons }, (_, i) => i + 1);
    const seasons = await Promise.all(seasonNumbers.map((n) => this.getSeason(id, n)));

    console.log(`  ✓ Loaded TV: "${series.name}" (${seasons.length} seasons)`);

    return {
      id: series.id,
      name: series.name,
      year: yearFromDate(series.first_air_date),
      numberOfSeasons: series.number_of_seasons,
      seasons,
    };
  }

  async getSeason(showId: number, seasonNumber: number): Promise<Season> {
    const season = await this.get<TMDbSeason>(`/tv/${showId}/season/${seasonNumber}`);

    const episodes: EpisodeRecord[] = (season.episodes || []).map((episode) => ({
      seasonNumber: episode.season_number,
      episodeNumber: episode.episode_number,
      name: episode.name,
    }));

    return {
      seasonNumber: season.season_number,
      name: season.name,
      episodes,
    };
  }

  async getMovie(id: number): Promise<Movie> {
    const movie = await this.get<TMDbMovieDetails>(`/movie/${id}`);

    console.log(`  ✓ Loaded movie: "${movie.title}" (${movie.release_date?.substring(0, 4) || '????'})`);

    return {
      id: movie.id,
      title: movie.title,
      releaseDate: movie.release_date ?? '',
      year: yearFromDate(movie.release_date),
    };
  }

  async searchTv(query: string): Promise<SearchPage<TvSearchResult>> {
    console.log(`📺 TMDb TV search: "${query}"`);
    const response = await this.get<TMDbSearchResponse<TMDbTVShow>>('/search/tv', { query });

    return {
      totalResults: response.total_results,
      results: (response.results || []).map((show) => ({
        id: show.id,
        name: show.name,
        originalLanguage: optional(show.original_language),
        popularity: optional(show.popularity),
        firstAirDate: optional(show.first_air_date),
      })),
    };
  }

  async searchMovie(query: string): Promise<SearchPage<MovieSearchResult>> {
    console.log(`🎬 TMDb search: "${query}"`);
    const response = await this.get<TMDbSearchResponse<TMDbMovie>>('/search/movie', { query });

    return {
      totalResults: response.total_results,
      results: (response.results || []).map((movie) => ({
        id: movie.id,
        title: movie.title,
        originalLanguage: optional(movie.original_language),
        popularity: optional(movie.popularity),
        releaseDate: optional(movie.release_date),
      })),
    };
  }

  private async get<T>(resource: string, params: Record<string, string> = {}): Promise<T> {
    try {
      const response = await this.http.get<T>(resource, {
        params: { language: this.config.tmdbLanguage, ...params },
        headers: { Authorization: `Bearer ${this.config.tmdbApiToken}` },
        timeout: this.config.requestTimeoutMs,
      });
      return response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new MetadataFetchError(resource, status, error);
    }
  }
}
