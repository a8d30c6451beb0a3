import fg from 'fast-glob';
import micromatch from 'micromatch';
import path from 'path';
import * as fs from 'fs';
import { BINARY_SNIFF_BYTES, DEFAULT_EXCLUDED_DIRS } from '../config/constants';
import { ConfigError, handleUnknownError } from '../errors/index';
import { normalizeExtension } from '../presets/pattern-matcher';
import type { FileEntry, FileFilters } from '../presets/types';

const FILTER_MATCH_OPTIONS: micromatch.Options = { dot: true, basename: true };

export interface ResolveFilesOptions {
  sourceDir: string;
  filters: FileFilters;
  // Absolute paths never listed (the bundle being written, for one)
  skip?: string[];
}

export function extensionOf(filePath: string): string {
  const name = path.posix.basename(filePath);
  const ext = path.posix.extname(name);
  if (ext === '' && name.startsWith('.')) return name.toLowerCase();
  return ext.toLowerCase();
}

export function isHiddenPath(relativePath: string): boolean {
  return relativePath.split('/').some((segment) => segment.startsWith('.') && segment !== '.' && segment !== '..');
}

export function isBinaryFile(absolutePath: string): boolean {
  const fd = fs.openSync(absolutePath, 'r');
  try {
    const buffer = Buffer.alloc(BINARY_SNIFF_BYTES);
    const read = fs.readSync(fd, buffer, 0, BINARY_SNIFF_BYTES, 0);
    return buffer.subarray(0, read).includes(0);
  } finally {
    fs.closeSync(fd);
  }
}

/*
 * Reads a paths file: one path or glob per line, blank lines and '#'
 * comments ignored.
 */
export function readPathsFile(file: string): string[] {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading paths file');
    throw new ConfigError(`Failed to read paths file: ${err.message}`, { source: file });
  }
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'))
    .map((line) => line.replace(/\\/g, '/').replace(/^\.\//, ''));
}

/*
 * Lists candidate files under sourceDir, applying the traversal filters
 * gathered from the preset documents. Hidden and binary files are listed
 * and flagged; whether they are bundled is a per-file setting.
 */
export function resolveFiles(options: ResolveFilesOptions): FileEntry[] {
  const sourceDir = path.resolve(options.sourceDir);
  const { filters } = options;
  const skip = new Set((options.skip ?? []).map((p) => path.resolve(p)));

  const includeFromFiles = filters.includePathsFiles.flatMap(readPathsFile);
  const excludeFromFiles = filters.excludePathsFiles.flatMap(readPathsFile);
  const includePatterns = [...filters.includePatterns, ...includeFromFiles];
  const excludePatterns = [...filters.excludePatterns, ...excludeFromFiles];
  const includeExtensions = new Set(filters.includeExtensions.map(normalizeExtension));
  const excludeExtensions = new Set(filters.excludeExtensions.map(normalizeExtension));

  const found = fg.sync('**/*', {
    cwd: sourceDir,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    ignore: DEFAULT_EXCLUDED_DIRS.map((dir) => `**/${dir}/**`),
  });

  const entries: FileEntry[] = [];
  for (const relative of found.sort()) {
    const absolute = path.join(sourceDir, relative);
    if (skip.has(absolute)) continue;

    const extension = extensionOf(relative);
    if (includeExtensions.size > 0 && !includeExtensions.has(extension)) continue;
    if (excludeExtensions.has(extension)) continue;
    if (includePatterns.length > 0 && !micromatch.isMatch(relative, includePatterns, FILTER_MATCH_OPTIONS)) continue;
    if (excludePatterns.length > 0 && micromatch.isMatch(relative, excludePatterns, FILTER_MATCH_OPTIONS)) continue;

    entries.push({
      path: relative,
      extension,
      sizeBytes: fs.statSync(absolute).size,
      isHidden: isHiddenPath(relative),
      isBinary: isBinaryFile(absolute),
    });
  }
  return entries;
}
