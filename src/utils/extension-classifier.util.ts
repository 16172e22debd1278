import fs from 'fs';
import path from 'path';
import { SUBTITLE_EXTENSIONS, VIDEO_EXTENSIONS } from '../config/constants';

export function isVideoExtension(extension: string): boolean {
  return VIDEO_EXTENSIONS.includes(extension.toLowerCase());
}

export function isSubtitleExtension(extension: string): boolean {
  return SUBTITLE_EXTENSIONS.includes(extension.toLowerCase());
}

/**
 * Lowercased extension (without the dot) of an eligible media file, or null.
 * Directories, extensionless files and anything outside the allow-list are not eligible.
 */
export function classifyExtension(filePath: string): string | null {
  const stats = fs.statSync(filePath, { throwIfNoEntry: false });
  if (stats?.isDirectory()) {
    return null;
  }

  const ext = path.extname(filePath).slice(1).toLowerCase();
  if (!ext) {
    return null;
  }

  if (!isVideoExtension(ext) && !isSubtitleExtension(ext)) {
    return null;
  }

  return ext;
}
