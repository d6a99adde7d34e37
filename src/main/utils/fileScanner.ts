/**
 * File Scanner Utility
 *
 * Lists the audio files a run will process, optionally descending into
 * subdirectories.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_EXTENSION } from '../../shared/types';

/** Options for scanning a directory */
export interface ScanOptions {
  /** Descend into subdirectories. Defaults to false */
  recursive?: boolean;
  /** Extension to match, with or without the dot. Defaults to .mp3 */
  extension?: string;
}

/**
 * Normalizes an extension to lower case with a leading dot.
 * @param extension - e.g. "MP3", ".mp3"
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * Checks if a file has the given extension (case-insensitive).
 * @param filePath - Path to the file
 * @param extension - Normalized extension, e.g. ".mp3"
 */
export function hasExtension(filePath: string, extension: string): boolean {
  return path.extname(filePath).toLowerCase() === extension;
}

/**
 * Scans a directory for files with the configured extension.
 * Unreadable subdirectories are skipped.
 * @param dirPath - Path to the directory to scan
 * @returns Sorted array of paths to matching files
 */
export function scanDirectoryForAudioFiles(dirPath: string, options: ScanOptions = {}): string[] {
  const extension = normalizeExtension(options.extension ?? DEFAULT_EXTENSION);
  const recursive = options.recursive ?? false;
  const audioFiles: string[] = [];

  function scan(currentPath: string): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(currentPath, { withFileTypes: true });
    } catch {
      // Skip directories we can't read (permissions, etc.)
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);

      if (entry.isDirectory()) {
        if (recursive) scan(fullPath);
      } else if (entry.isFile() && hasExtension(entry.name, extension)) {
        audioFiles.push(fullPath);
      }
    }
  }

  scan(dirPath);
  return audioFiles.sort();
}
