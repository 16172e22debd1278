const ILLEGAL_CHARS = /[\/\\?<>:*|"]/g;
const CONTROL_CHARS = /[\x00-\x1f\x80-\x9f]/g;
const RESERVED_NAMES = /^(con|prn|aux|nul|com\d|lpt\d)(\..*)?$/i;
const TRAILING_DOTS_SPACES = /[. ]+$/;
const MAX_BYTES = 255;

/**
 * Make a single path segment safe on common filesystems.
 */
export function sanitizeFileName(name: string): string {
  let sanitized = name.replace(ILLEGAL_CHARS, '').replace(CONTROL_CHARS, '');

  if (sanitized === '.' || sanitized === '..' || RESERVED_NAMES.test(sanitized)) {
    return '';
  }

  sanitized = sanitized.replace(TRAILING_DOTS_SPACES, '');

  return truncateBytes(sanitized, MAX_BYTES);
}

function truncateBytes(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, 'utf8') <= maxBytes) {
    return value;
  }

  let result = '';
  let bytes = 0;
  for (const char of value) {
    const size = Buffer.byteLength(char, 'utf8');
    if (bytes + size > maxBytes) {
      break;
    }
    result += char;
    bytes += size;
  }
  return result;
}
