import { isComment, isTag } from 'domhandler';
import { commentSyntaxFor, JSON_SYNTAX, scanCode, type CommentSyntax } from './code-scanner';
import { loadHtml, walkNodes } from './html-document';
import type { ActionHandler } from './types';

const HTML_EXTENSIONS = new Set(['.html', '.htm', '.xhtml']);
const CSS_EXTENSIONS = new Set(['.css', '.scss', '.less']);
const SCRIPT_EXTENSIONS = new Set(['.js', '.jsx', '.mjs', '.cjs', '.ts', '.tsx', '.mts', '.cts']);
const JSON_EXTENSIONS = new Set(['.json']);

// Elements whose whitespace is significant, or whose body is not HTML
const PROTECTED_ELEMENTS = new Set(['pre', 'textarea', 'script', 'style']);

interface SourceRange {
  start: number;
  end: number;
  keep: boolean;
}

/*
 * Source ranges of comments (dropped) and protected elements (kept
 * verbatim), taken from the parse tree.
 */
function htmlRanges(content: string): SourceRange[] {
  const $ = loadHtml(content);
  const ranges: SourceRange[] = [];
  walkNodes($.root().contents().toArray(), (node) => {
    const keep = isTag(node) && PROTECTED_ELEMENTS.has(node.name.toLowerCase());
    if (!keep && !isComment(node)) return true;
    if (node.startIndex !== null && node.endIndex !== null) {
      ranges.push({ start: node.startIndex, end: Math.min(node.endIndex + 1, content.length), keep });
    }
    return false;
  });
  return ranges.sort((a, b) => a.start - b.start);
}

export function minifyHtml(content: string): string {
  const protectedBlocks: string[] = [];
  // Shaped like a tag so whitespace between it and neighbouring tags collapses
  const placeholder = (index: number): string => `<\uE000${index}\uE001>`;

  let result = '';
  let cursor = 0;
  for (const range of htmlRanges(content)) {
    if (range.start < cursor) continue;
    result += content.slice(cursor, range.start);
    if (range.keep) {
      protectedBlocks.push(content.slice(range.start, range.end));
      result += placeholder(protectedBlocks.length - 1);
    }
    cursor = range.end;
  }
  result += content.slice(cursor);

  result = result
    .replace(/\s+/g, ' ')
    .replace(/>\s+</g, '><')
    .trim();

  return result.replace(/<\uE000(\d+)\uE001>/g, (_match: string, index: string) => protectedBlocks[Number(index)] ?? '');
}

export function minifyCss(content: string): string {
  const syntax = commentSyntaxFor('.css');
  if (!syntax) return content;
  return scanCode(content, syntax)
    .map((segment) => {
      if (segment.kind === 'comment') return '';
      if (segment.kind === 'string') return segment.text;
      return segment.text
        .replace(/\s+/g, ' ')
        .replace(/\s*([{};,>])\s*/g, '$1')
        .replace(/:\s+/g, ':');
    })
    .join('')
    .replace(/;}/g, '}')
    .trim();
}

function minifyScript(content: string, syntax: CommentSyntax): string {
  let out = '';
  for (const segment of scanCode(content, syntax)) {
    if (segment.kind === 'comment') {
      if (segment.block) out += ' ';
      continue;
    }
    if (segment.kind === 'string') {
      out += segment.text;
      continue;
    }
    let text = segment.text.replace(/[ \t]*\r?\n\s*/g, '\n').replace(/[ \t]+/g, ' ');
    if (text.startsWith('\n')) {
      out = out.replace(/[ \t]+$/, '');
      // A removed line comment would otherwise leave a blank line
      if (out === '' || out.endsWith('\n')) text = text.slice(1);
    }
    out += text;
  }
  return out.trim();
}

export function minifyJson(content: string): string {
  return scanCode(content, JSON_SYNTAX)
    .map((segment) => (segment.kind === 'string' ? segment.text : segment.text.replace(/\s+/g, '')))
    .join('');
}

function tidyText(content: string): string {
  return content
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/*
 * File-type aware whitespace and comment reduction. Files of an unknown
 * type only lose trailing whitespace and runs of blank lines.
 */
export const minify: ActionHandler = (content, _settings, context) => {
  const extension = context.extension.toLowerCase();
  if (HTML_EXTENSIONS.has(extension)) return minifyHtml(content);
  if (CSS_EXTENSIONS.has(extension)) return minifyCss(content);
  if (JSON_EXTENSIONS.has(extension)) return minifyJson(content);
  if (SCRIPT_EXTENSIONS.has(extension)) {
    const syntax = commentSyntaxFor(extension);
    if (syntax) return minifyScript(content, syntax);
  }
  return tidyText(content);
};
