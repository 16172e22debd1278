import fs from 'fs';
import os from 'os';
import path from 'path';
import axios, { AxiosError, AxiosInstance, AxiosPromise, InternalAxiosRequestConfig } from 'axios';
import { Movie, Show } from '../../types/media.types';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'tidyreel-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Create files (and their parent folders) under root. Content defaults to the relative path.
 */
export function touch(root: string, ...relativePaths: string[]): string[] {
  return relativePaths.map((relativePath) => {
    const fullPath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, relativePath);
    return fullPath;
  });
}

export const showName: Show = {
  id: 1399,
  name: 'Show Name',
  year: 2008,
  numberOfSeasons: 2,
  seasons: [
    {
      seasonNumber: 1,
      name: 'Season 1',
      episodes: [
        { seasonNumber: 1, episodeNumber: 1, name: 'One' },
        { seasonNumber: 1, episodeNumber: 2, name: 'Two' },
      ],
    },
    {
      seasonNumber: 2,
      name: 'Season 2',
      episodes: [{ seasonNumber: 2, episodeNumber: 1, name: 'Three' }],
    },
  ],
};

export const fightClub: Movie = {
  id: 550,
  title: 'Fight Club',
  releaseDate: '1999-10-15',
  year: 1999,
};

/**
 * Axios instance answering from a route table in process; unknown routes get a 404.
 */
export function fakeHttp(routes: Record<string, unknown>, calls: InternalAxiosRequestConfig[] = []): AxiosInstance {
  return axios.create({
    adapter: async (config: InternalAxiosRequestConfig): AxiosPromise => {
      calls.push(config);
      const url = config.url ?? '';
      if (!(url in routes)) {
        throw new AxiosError('Request failed with status code 404', 'ERR_BAD_REQUEST', config, null, {
          data: { status_message: 'The resource you requested could not be found.' },
          status: 404,
          statusText: 'Not Found',
          headers: {},
          config,
        });
      }
      return { data: routes[url], status: 200, statusText: 'OK', headers: {}, config };
    },
  });
}

export const testTmdbConfig = {
  tmdbApiToken: 'test-token',
  tmdbBaseUrl: 'https://tmdb.invalid/3',
  tmdbLanguage: 'en-US',
  requestTimeoutMs: 1000,
};
