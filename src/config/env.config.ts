import dotenv from 'dotenv';
import { ConfigError } from '../utils/errors';

dotenv.config();

export interface EnvConfig {
  tmdbApiToken: string;
  tmdbBaseUrl: string;
  tmdbLanguage: string;
  requestTimeoutMs: number;
  minPopularity: number;
  requireSingleMovieFile: boolean;
}

type Env = Record<string, string | undefined>;

function parseNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

function parseBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  if (['1', 'true', 'yes', 'on'].includes(raw)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(raw)) {
    return false;
  }
  throw new ConfigError(`${key} must be a boolean, got "${env[key]}"`);
}

export function loadConfig(env: Env = process.env): EnvConfig {
  return {
    tmdbApiToken: env.TMDB_API_TOKEN?.trim() || '',
    tmdbBaseUrl: env.TMDB_BASE_URL?.trim() || 'https://api.themoviedb.org/3',
    tmdbLanguage: env.TMDB_LANGUAGE?.trim() || 'en-US',
    requestTimeoutMs: parseNumber(env, 'TMDB_TIMEOUT_MS', 10000),
    minPopularity: parseNumber(env, 'MIN_POPULARITY', 1.0),
    requireSingleMovieFile: parseBoolean(env, 'REQUIRE_SINGLE_MOVIE_FILE', true),
  };
}

let fullConfig: EnvConfig | null = null;

/**
 * Load configuration from the environment (and .env) once per process.
 */
export function initConfig(): EnvConfig {
  if (!fullConfig) {
    fullConfig = loadConfig();
  }
  return fullConfig;
}

/**
 * Token is only needed once we talk to TMDb, so `--help` works without one.
 */
export function requireApiToken(config: EnvConfig): string {
  if (!config.tmdbApiToken) {
    throw new ConfigError('TMDB_API_TOKEN is not set. Add it to your environment or .env file.');
  }
  return config.tmdbApiToken;
}
