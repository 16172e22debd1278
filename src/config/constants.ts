export const VIDEO_EXTENSIONS = ['mp4', 'mkv', 'avi', 'mov', 'flv', 'wmv', 'webm'];

// Ancillary files that travel with the video but never count as one
export const SUBTITLE_EXTENSIONS = ['srt'];

export const EPISODE_PATTERNS = {
  // Last match wins, so a season in the filename overrides one in a parent folder
  SEASON: /s(?:eason)?[._\-\s]*(\d+)/gi,
  // E05, Episode 5, or a bare 1-2 digit number such as "05 Pilot.mkv"
  EPISODE: /(?:e(?:pisode)?\s*|\b)(\d{1,2})(?:[._\-]|\b)/gi,
};

export const TITLE_METADATA_PATTERNS: ReadonlyArray<{ name: string; pattern: RegExp }> = [
  { name: 'season', pattern: /[Ss]\d+/ },
  { name: 'episode', pattern: /[Ee]\d+/ },
  { name: 'year', pattern: /\d{4}/ },
  { name: 'resolution', pattern: /\d{3,4}p/ },
  { name: 'source', pattern: /(bluray|brrip|webrip|web-dl|hdtv|dvdrip|xvid|x264|x265|h264|h265)/i },
  { name: 'release', pattern: /(proper|repack|internal|limited|unrated|extended|directors.cut)/i },
  { name: 'brackets', pattern: /\[.*?\]/ },
  { name: 'parentheses', pattern: /\(.*?\)/ },
];

export const AUTO_DETECT_MAX_DEPTH = 3;

export const OPERATIONS_PREVIEW_LIMIT = 10;

export const SELECT_PAGE_SIZE = 10;

export const TMDB_WEB_URL = 'https://www.themoviedb.org';
