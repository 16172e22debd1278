export enum ContentType {
  Show = 'TV Show',
  Movie = 'Movie',
}

export enum OperationMode {
  Copy = 'copy',
  Move = 'move',
  Link = 'link',
}

export interface EpisodeRecord {
  seasonNumber: number;
  episodeNumber: number;
  name: string;
}

export interface Season {
  seasonNumber: number;
  name: string;
  episodes: EpisodeRecord[];
}

export interface Show {
  id: number;
  name: string;
  year: number;
  numberOfSeasons: number;
  seasons: Season[];
}

export interface Movie {
  id: number;
  title: string;
  releaseDate: string;
  year: number;
}

export interface TvSearchResult {
  id: number;
  name: string;
  originalLanguage?: string;
  popularity?: number;
  firstAirDate?: string;
}

export interface MovieSearchResult {
  id: number;
  title: string;
  originalLanguage?: string;
  popularity?: number;
  releaseDate?: string;
}

export interface SearchPage<T> {
  results: T[];
  totalResults: number;
}

export interface PendingOperation {
  source: string;
  destination: string;
}
