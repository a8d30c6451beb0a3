/*
 * A small lexer that splits source text into code, string and comment
 * segments, so comment stripping and minification never touch literals.
 */

export interface CommentSyntax {
  line: string[];
  block: Array<[string, string]>;
  // Longest delimiters first ('"""' before '"')
  quotes: string[];
  regexLiterals?: boolean;
  // '#' starts a comment only at line start or after whitespace (shell, YAML)
  hashNeedsSpace?: boolean;
}

export type SegmentKind = 'code' | 'string' | 'comment';

export interface Segment {
  kind: SegmentKind;
  text: string;
  block: boolean;
}

const C_LIKE: CommentSyntax = { line: ['//'], block: [['/*', '*/']], quotes: ['"', "'"] };
const JS_LIKE: CommentSyntax = { ...C_LIKE, quotes: ['"', "'", '`'], regexLiterals: true };
const CSS: CommentSyntax = { line: [], block: [['/*', '*/']], quotes: ['"', "'"] };
const SCSS: CommentSyntax = { line: ['//'], block: [['/*', '*/']], quotes: ['"', "'"] };
const PYTHON: CommentSyntax = { line: ['#'], block: [], quotes: ['"""', "'''", '"', "'"] };
const HASH: CommentSyntax = { line: ['#'], block: [], quotes: ['"', "'"], hashNeedsSpace: true };
const SQL: CommentSyntax = { line: ['--'], block: [['/*', '*/']], quotes: ["'", '"'] };
const MARKUP: CommentSyntax = { line: [], block: [['<!--', '-->']], quotes: [] };
const PHP: CommentSyntax = { line: ['//', '#'], block: [['/*', '*/']], quotes: ['"', "'"] };
export const JSON_SYNTAX: CommentSyntax = { line: [], block: [], quotes: ['"'] };

const SYNTAX_BY_EXTENSION: Record<string, CommentSyntax> = {
  '.js': JS_LIKE,
  '.jsx': JS_LIKE,
  '.mjs': JS_LIKE,
  '.cjs': JS_LIKE,
  '.ts': JS_LIKE,
  '.tsx': JS_LIKE,
  '.mts': JS_LIKE,
  '.cts': JS_LIKE,
  '.java': C_LIKE,
  '.c': C_LIKE,
  '.h': C_LIKE,
  '.cpp': C_LIKE,
  '.hpp': C_LIKE,
  '.cc': C_LIKE,
  '.cs': C_LIKE,
  '.go': { ...C_LIKE, quotes: ['"', "'", '`'] },
  '.rs': C_LIKE,
  '.swift': C_LIKE,
  '.kt': C_LIKE,
  '.scala': C_LIKE,
  '.dart': C_LIKE,
  '.php': PHP,
  '.css': CSS,
  '.scss': SCSS,
  '.less': SCSS,
  '.py': PYTHON,
  '.pyi': PYTHON,
  '.sh': HASH,
  '.bash': HASH,
  '.zsh': HASH,
  '.rb': HASH,
  '.pl': HASH,
  '.r': HASH,
  '.yml': HASH,
  '.yaml': HASH,
  '.toml': HASH,
  '.sql': SQL,
  '.html': MARKUP,
  '.htm': MARKUP,
  '.xml': MARKUP,
  '.svg': MARKUP,
  '.vue': MARKUP,
};

export function commentSyntaxFor(extension: string): CommentSyntax | null {
  return SYNTAX_BY_EXTENSION[extension.toLowerCase()] ?? null;
}

const REGEX_PRECEDERS = new Set(['(', ',', '=', ':', '[', '!', '&', '|', '?', '{', '}', ';', '+', '-', '*', '%', '<', '>', '~', '^']);
const REGEX_KEYWORDS = /(?:^|[^\w$])(?:return|typeof|case|in|of|delete|void|throw|new|yield|await)\s*$/;

function findStringEnd(content: string, start: number, quote: string): number {
  const multiline = quote.length === 3 || quote === '`';
  let i = start + quote.length;
  while (i < content.length) {
    const ch = content[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (content.startsWith(quote, i)) return i + quote.length;
    // Unterminated single-line strings end at the newline
    if (ch === '\n' && !multiline) return i;
    i++;
  }
  return content.length;
}

function findRegexEnd(content: string, start: number): number {
  let inClass = false;
  let i = start + 1;
  while (i < content.length) {
    const ch = content[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '\n') return -1;
    if (ch === '[') inClass = true;
    else if (ch === ']') inClass = false;
    else if (ch === '/' && !inClass) {
      i++;
      while (i < content.length && /[a-z]/i.test(content[i] ?? '')) i++;
      return i;
    }
    i++;
  }
  return -1;
}

function canStartRegex(code: string, previous: Segment | undefined): boolean {
  const trimmed = code.trimEnd();
  if (trimmed === '') {
    // Directly after a string literal a slash is division
    return previous?.kind !== 'string';
  }
  const last = trimmed[trimmed.length - 1] ?? '';
  return REGEX_PRECEDERS.has(last) || REGEX_KEYWORDS.test(trimmed);
}

function isLineCommentStart(content: string, i: number, marker: string, syntax: CommentSyntax): boolean {
  if (!content.startsWith(marker, i)) return false;
  if (marker === '#' && syntax.hashNeedsSpace && i > 0) {
    return /\s/.test(content[i - 1] ?? '');
  }
  return true;
}

export function scanCode(content: string, syntax: CommentSyntax): Segment[] {
  const segments: Segment[] = [];
  let code = '';
  let i = 0;

  const flushCode = (): void => {
    if (code) {
      segments.push({ kind: 'code', text: code, block: false });
      code = '';
    }
  };

  while (i < content.length) {
    const block = syntax.block.find(([open]) => content.startsWith(open, i));
    if (block) {
      const [open, close] = block;
      const end = content.indexOf(close, i + open.length);
      const stop = end === -1 ? content.length : end + close.length;
      flushCode();
      segments.push({ kind: 'comment', text: content.slice(i, stop), block: true });
      i = stop;
      continue;
    }

    const lineMarker = syntax.line.find((marker) => isLineCommentStart(content, i, marker, syntax));
    if (lineMarker) {
      let end = content.indexOf('\n', i);
      if (end === -1) end = content.length;
      if (content[end - 1] === '\r') end--;
      flushCode();
      segments.push({ kind: 'comment', text: content.slice(i, end), block: false });
      i = end;
      continue;
    }

    const quote = syntax.quotes.find((q) => content.startsWith(q, i));
    if (quote) {
      const stop = findStringEnd(content, i, quote);
      flushCode();
      segments.push({ kind: 'string', text: content.slice(i, stop), block: false });
      i = stop;
      continue;
    }

    if (syntax.regexLiterals && content[i] === '/' && canStartRegex(code, segments[segments.length - 1])) {
      const stop = findRegexEnd(content, i);
      if (stop !== -1) {
        flushCode();
        segments.push({ kind: 'string', text: content.slice(i, stop), block: false });
        i = stop;
        continue;
      }
    }

    code += content[i];
    i++;
  }

  flushCode();
  return segments;
}
