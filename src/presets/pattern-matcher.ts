import micromatch from 'micromatch';
import path from 'path';
import type { FileEntry, Rule } from './types';

const MATCH_OPTIONS: micromatch.Options = {
  dot: true,
  // Patterns without a slash ("*.md") are tried against the basename
  basename: true,
};

export function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  if (trimmed === '') return '';
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/*
 * Joins a rule pattern onto its group's base path, in POSIX form.
 */
export function resolvePattern(pattern: string, basePath: string | null): string {
  const joined = basePath ? path.posix.join(basePath, pattern) : pattern;
  const normalized = path.posix.normalize(joined);
  return normalized.startsWith('./') ? normalized.slice(2) : normalized;
}

/*
 * Extension keys to look up for a file, most specific first:
 * "app.min.js" yields [".min.js", ".js"], ".env" yields [".env"].
 */
export function extensionCandidates(file: FileEntry): string[] {
  const name = path.posix.basename(file.path).toLowerCase();
  const candidates: string[] = [];

  let idx = name.indexOf('.', 1);
  if (idx === -1 && name.startsWith('.')) {
    candidates.push(name);
  }
  while (idx !== -1) {
    candidates.push(name.slice(idx));
    idx = name.indexOf('.', idx + 1);
  }

  const declared = normalizeExtension(file.extension);
  if (declared && !candidates.includes(declared)) {
    candidates.push(declared);
  }
  return candidates;
}

export function matchesExtension(file: FileEntry, extensions: string[]): boolean {
  const name = path.posix.basename(file.path).toLowerCase();
  const declared = normalizeExtension(file.extension);
  return extensions.some((raw) => {
    const ext = normalizeExtension(raw);
    if (ext === '') return false;
    return ext === declared || name.endsWith(ext);
  });
}

export function matchesPatterns(filePath: string, patterns: string[], basePath: string | null): boolean {
  return patterns.some((pattern) => micromatch.isMatch(filePath, resolvePattern(pattern, basePath), MATCH_OPTIONS));
}

/*
 * A rule matches when every axis it declares matches: extensions AND
 * (any of) patterns. A rule that declares neither axis matches nothing.
 */
export function matchesRule(file: FileEntry, rule: Rule, basePath: string | null): boolean {
  const hasExtensions = rule.extensions.length > 0;
  const hasPatterns = rule.patterns.length > 0;
  if (!hasExtensions && !hasPatterns) return false;

  if (hasExtensions && !matchesExtension(file, rule.extensions)) return false;
  if (hasPatterns && !matchesPatterns(file.path, rule.patterns, basePath)) return false;
  return true;
}
