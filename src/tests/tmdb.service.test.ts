import { InternalAxiosRequestConfig } from 'axios';
import { TMDbService, yearFromDate } from '../services/tmdb.service';
import { MetadataFetchError } from '../utils/errors';
import { fakeHttp, fightClub, testTmdbConfig } from './helpers/fixtures';

const routes = {
  '/tv/1399': {
    id: 1399,
    name: 'Show Name',
    overview: '',
    first_air_date: '2008-01-20',
    number_of_episodes: 3,
    number_of_seasons: 2,
  },
  '/tv/1399/season/1': {
    id: 1,
    season_number: 1,
    name: 'Season 1',
    air_date: '2008-01-20',
    episodes: [
      { id: 11, season_number: 1, episode_number: 1, name: 'One', overview: 'First.', air_date: '2008-01-20' },
      { id: 12, season_number: 1, episode_number: 2, name: 'Two', overview: '', air_date: null },
    ],
  },
  '/tv/1399/season/2': {
    id: 2,
    season_number: 2,
    name: 'Season 2',
    air_date: null,
    episodes: [{ id: 21, season_number: 2, episode_number: 1, name: 'Three', overview: '', air_date: null }],
  },
  '/movie/550': { id: 550, title: 'Fight Club', release_date: '1999-10-15' },
  '/search/tv': {
    page: 1,
    total_pages: 1,
    total_results: 2,
    results: [
      { id: 1, name: 'Show', original_language: 'en', popularity: 12.3, first_air_date: '2008-01-20' },
      { id: 2, name: 'Other', original_language: null, popularity: null, first_air_date: null },
    ],
  },
  '/search/movie': {
    page: 1,
    total_pages: 1,
    total_results: 1,
    results: [{ id: 550, title: 'Fight Club', original_language: 'en', popularity: 40, release_date: '1999-10-15' }],
  },
};

describe('TMDbService', () => {
  let calls: InternalAxiosRequestConfig[];
  let tmdb: TMDbService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    calls = [];
    tmdb = new TMDbService(testTmdbConfig, fakeHttp(routes, calls));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('getShow', () => {
    test('should load the series and every season', async () => {
      const show = await tmdb.getShow(1399);

      expect(show).toMatchObject({ id: 1399, name: 'Show Name', year: 2008, numberOfSeasons: 2 });
      expect(show.seasons.map((season) => season.seasonNumber)).toEqual([1, 2]);
      expect(show.seasons[0].episodes[0]).toEqual({ seasonNumber: 1, episodeNumber: 1, name: 'One' });
      expect(show.seasons[1].episodes.map((episode) => episode.name)).toEqual(['Three']);
    });

    test('should request season pages starting at 1', async () => {
      await tmdb.getShow(1399);

      expect(calls.map((call) => call.url).sort()).toEqual(['/tv/1399', '/tv/1399/season/1', '/tv/1399/season/2']);
    });
  });

  test('getMovie should map release year', async () => {
    expect(await tmdb.getMovie(550)).toEqual(fightClub);
  });

  test('should send the bearer token, language and timeout with every request', async () => {
    await tmdb.searchTv('show');

    const [call] = calls;
    expect(call.headers.get('Authorization')).toBe('Bearer test-token');
    expect(call.params).toEqual({ language: 'en-US', query: 'show' });
    expect(call.timeout).toBe(1000);
  });

  describe('search', () => {
    test('searchTv should map results and totals', async () => {
      const page = await tmdb.searchTv('show');

      expect(page.totalResults).toBe(2);
      expect(page.results).toEqual([
        { id: 1, name: 'Show', originalLanguage: 'en', popularity: 12.3, firstAirDate: '2008-01-20' },
        { id: 2, name: 'Other' },
      ]);
      expect(page.results[1].popularity).toBeUndefined();
    });

    test('searchMovie should map results and totals', async () => {
      const page = await tmdb.searchMovie('fight club');

      expect(page).toEqual({
        totalResults: 1,
        results: [{ id: 550, title: 'Fight Club', originalLanguage: 'en', popularity: 40, releaseDate: '1999-10-15' }],
      });
    });
  });

  test('should wrap HTTP failures with the resource and status', async () => {
    const failure = tmdb.getMovie(1);

    await expect(failure).rejects.toBeInstanceOf(MetadataFetchError);
    await expect(failure).rejects.toMatchObject({ resource: '/movie/1', status: 404 });
  });

  test('should fail the whole show when a season page is missing', async () => {
    const partial = new TMDbService(testTmdbConfig, fakeHttp({ '/tv/1399': routes['/tv/1399'] }));

    await expect(partial.getShow(1399)).rejects.toMatchObject({
      resource: expect.stringMatching(/^\/tv\/1399\/season\/[12]$/),
      status: 404,
    });
  });

  test('yearFromDate', () => {
    expect(yearFromDate('2008-01-20')).toBe(2008);
    expect(yearFromDate('')).toBe(0);
    expect(yearFromDate(null)).toBe(0);
    expect(yearFromDate(undefined)).toBe(0);
  });
});
