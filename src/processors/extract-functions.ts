import { z } from 'zod';
import { parseWithSchema } from '../boundaries/yaml-parser';
import { commentSyntaxFor, scanCode } from '../actions/code-scanner';
import type { Processor } from './types';

const LANGUAGE_BY_EXTENSION: Record<string, Language> = {
  '.py': 'python',
  '.pyi': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
};

const LANGUAGES = ['python', 'javascript', 'typescript'] as const;
type Language = (typeof LANGUAGES)[number];

const EXTRACT_ARGS_SCHEMA = z
  .object({
    languages: z.array(z.enum(LANGUAGES)).default([...LANGUAGES]),
    include_docstrings: z.boolean().default(true),
  })
  .strict();

const NO_FUNCTIONS = '# No functions found';

const PY_DEF = /^(\s*)(?:async\s+)?def\s+\w+/;
const PY_DOCSTRING = /^\s*[rRbBuU]?("""|''')/;

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function extractPython(content: string, includeDocstrings: boolean): string[] {
  const lines = content.split(/\r?\n/);
  const blocks: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const header = PY_DEF.exec(lines[i] ?? '');
    if (!header) {
      i++;
      continue;
    }
    const indent = (header[1] ?? '').length;

    let start = i;
    while (start > 0 && /^\s*@/.test(lines[start - 1] ?? '') && indentOf(lines[start - 1] ?? '') === indent) start--;

    // The signature may wrap; the body starts after the line ending in ':'
    let end = i;
    while (end < lines.length - 1 && !/:\s*(#.*)?$/.test(lines[end] ?? '')) end++;
    const bodyStart = end + 1;
    end = bodyStart;
    while (end < lines.length) {
      const line = lines[end] ?? '';
      if (line.trim() !== '' && indentOf(line) <= indent) break;
      end++;
    }
    while (end > bodyStart && (lines[end - 1] ?? '').trim() === '') end--;

    let block = lines.slice(start, end);
    if (!includeDocstrings) block = dropPythonDocstring(block, bodyStart - start);

    blocks.push(block.join('\n'));
    i = end;
  }
  return blocks;
}

function dropPythonDocstring(block: string[], bodyOffset: number): string[] {
  const first = block[bodyOffset] ?? '';
  const opening = PY_DOCSTRING.exec(first);
  if (!opening) return block;
  const quote = opening[1] ?? '"""';
  const afterOpen = first.slice(first.indexOf(quote) + quote.length);
  let last = bodyOffset;
  if (!afterOpen.includes(quote)) {
    last++;
    while (last < block.length && !(block[last] ?? '').includes(quote)) last++;
  }
  return [...block.slice(0, bodyOffset), ...block.slice(last + 1)];
}

const JS_FUNCTION = /^\s*(?:export\s+)?(?:default\s+)?(?:async\s+)?function\b/;
const JS_ARROW = /^\s*(?:export\s+)?(?:const|let|var)\s+[\w$]+\s*(?::[^=]+)?=\s*(?:async\s+)?(?:\([^)]*\)|[\w$]+)\s*(?::[^=]+)?=>/;

/*
 * Blanks out strings and comments, keeping newlines, so brace counting
 * only sees real code.
 */
function maskNonCode(content: string, extension: string): string {
  const syntax = commentSyntaxFor(extension);
  if (!syntax) return content;
  return scanCode(content, syntax)
    .map((segment) => (segment.kind === 'code' ? segment.text : segment.text.replace(/[^\n]/g, ' ')))
    .join('');
}

function extractScript(content: string, extension: string, includeDocstrings: boolean): string[] {
  const lines = content.split('\n');
  const masked = maskNonCode(content, extension).split('\n');
  const blocks: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const code = masked[i] ?? '';
    if (!JS_FUNCTION.test(code) && !JS_ARROW.test(code)) {
      i++;
      continue;
    }

    let start = i;
    if (includeDocstrings && (lines[i - 1] ?? '').trim().endsWith('*/')) {
      let doc = i - 1;
      while (doc >= 0 && !(lines[doc] ?? '').trim().startsWith('/**')) doc--;
      if (doc >= 0) start = doc;
    }

    let depth = 0;
    let opened = false;
    let end = i;
    for (; end < lines.length; end++) {
      for (const ch of masked[end] ?? '') {
        if (ch === '{') {
          depth++;
          opened = true;
        } else if (ch === '}') {
          depth--;
        }
      }
      if (opened && depth <= 0) break;
      // Expression-bodied arrow: ends with its statement
      if (!opened && /;\s*$/.test(masked[end] ?? '')) break;
    }

    const last = Math.min(end, lines.length - 1);
    blocks.push(lines.slice(start, last + 1).join('\n').replace(/\r$/gm, ''));
    i = last + 1;
  }
  return blocks;
}

/*
 * Reduces a source file to its function definitions. Files in a language
 * that was not selected pass through unchanged.
 */
export const extractFunctions: Processor = (content, args, context) => {
  const options = parseWithSchema(EXTRACT_ARGS_SCHEMA, args, 'extract_functions arguments', { file: context.path });
  const extension = context.extension.toLowerCase();
  const language = LANGUAGE_BY_EXTENSION[extension];
  if (!language || !options.languages.includes(language)) return content;

  const blocks =
    language === 'python'
      ? extractPython(content, options.include_docstrings)
      : extractScript(content, extension, options.include_docstrings);

  return blocks.length > 0 ? blocks.join('\n\n') : NO_FUNCTIONS;
};
