import { ContentSelectorService } from '../services/content-selector.service';
import { TMDbService } from '../services/tmdb.service';
import { ContentType } from '../types/media.types';
import { NoSearchResultsError, OrganizeError } from '../utils/errors';
import { fakeHttp, fightClub, makeTempDir, removeDir, testTmdbConfig, touch } from './helpers/fixtures';
import { ScriptedPrompter } from './helpers/scripted-prompter';

const routes = {
  '/search/tv': {
    page: 1,
    total_pages: 1,
    total_results: 2,
    results: [
      { id: 1399, name: 'Show Name', first_air_date: '2008-01-20', popularity: 12.34 },
      { id: 7, name: 'Show Name Reborn', first_air_date: null, popularity: null },
    ],
  },
  '/tv/1399': { id: 1399, name: 'Show Name', overview: '', first_air_date: '2008-01-20', number_of_seasons: 1 },
  '/tv/1399/season/1': {
    id: 1,
    season_number: 1,
    name: 'Season 1',
    air_date: null,
    episodes: [{ id: 11, season_number: 1, episode_number: 1, name: 'One', overview: '', air_date: null }],
  },
  '/search/movie': {
    page: 1,
    total_pages: 1,
    total_results: 1,
    results: [{ id: 550, title: 'Fight Club', release_date: '1999-10-15', popularity: 40 }],
  },
  '/movie/550': { id: 550, title: 'Fight Club', release_date: '1999-10-15' },
};

describe('ContentSelectorService', () => {
  let root: string;
  let tmdb: TMDbService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    root = makeTempDir();
    tmdb = new TMDbService(testTmdbConfig, fakeHttp(routes));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeDir(root);
  });

  test('should detect a show and offer its title from the first video file', async () => {
    touch(root, 'extras/notes.txt', 'Show.Name.S01E01.720p.mkv', 'Show.Name.S01E02.720p.mkv');
    const prompter = new ScriptedPrompter();

    const selected = await new ContentSelectorService(tmdb, prompter).select(root);

    expect(prompter.asked).toEqual(['Search for:', 'TV Show Title:', 'Select a TV show:']);
    expect(prompter.selectDefaults).toEqual([0, 0]);
    expect(prompter.inputDefaults).toEqual(['Show Name']);
    expect(prompter.choiceNames[1]).toEqual([
      'Show Name (2008) - ID: 1399 - Popularity: 12.3',
      'Show Name Reborn (N/A) - ID: 7 - Popularity: 0.0',
    ]);
    expect(selected.type).toBe(ContentType.Show);
    if (selected.type === ContentType.Show) {
      expect(selected.show.seasons[0].episodes[0].name).toBe('One');
    }
  });

  test('should detect a movie and load the chosen one', async () => {
    touch(root, 'Fight.Club.1999.1080p.BluRay.mkv');
    const prompter = new ScriptedPrompter();

    const selected = await new ContentSelectorService(tmdb, prompter).select(root);

    expect(prompter.asked).toEqual(['Search for:', 'Movie Title:', 'Select a movie:']);
    expect(prompter.selectDefaults[0]).toBe(1);
    expect(prompter.inputDefaults).toEqual(['Fight Club']);
    expect(selected).toEqual({ type: ContentType.Movie, movie: fightClub });
  });

  test('should let the user override the detected type and title', async () => {
    touch(root, 'Fight.Club.1999.mkv');
    const prompter = new ScriptedPrompter({ select: [0, 0], input: ['Show Name'] });

    const selected = await new ContentSelectorService(tmdb, prompter).select(root);

    expect(selected.type).toBe(ContentType.Show);
  });

  test('should fail when no search results come back', async () => {
    const empty = new TMDbService(
      testTmdbConfig,
      fakeHttp({ '/search/movie': { page: 1, total_pages: 0, total_results: 0, results: [] } }),
    );

    await expect(new ContentSelectorService(empty, new ScriptedPrompter()).selectMovie('Nothing')).rejects.toThrow(
      new NoSearchResultsError('Nothing', 'movies').message,
    );
  });

  test('should fail when the source has no media files', () => {
    touch(root, 'notes.txt');

    expect(() => new ContentSelectorService(tmdb, new ScriptedPrompter()).findSampleFile(root)).toThrow(OrganizeError);
  });
});
