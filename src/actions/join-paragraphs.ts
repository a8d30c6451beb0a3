import type { ActionHandler } from './types';

const FENCE = /^\s*(```|~~~)/;
const BLOCK_START = /^(\s{4,}|\t|#{1,6}\s|>|[-*+]\s|\d+[.)]\s|\||<|(?:[-*_]\s*){3,}$)/;

/*
 * Joins hard-wrapped prose lines into one line per paragraph. Markdown
 * structure (fences, headings, lists, quotes, tables, rules, indented
 * code and raw HTML lines) is passed through unchanged.
 */
export const joinParagraphs: ActionHandler = (content) => {
  const lines = content.split(/\r?\n/);
  const output: string[] = [];
  let paragraph: string[] = [];
  let inFence = false;

  const flush = (): void => {
    if (paragraph.length > 0) {
      output.push(paragraph.join(' '));
      paragraph = [];
    }
  };

  for (const line of lines) {
    if (FENCE.test(line)) {
      flush();
      inFence = !inFence;
      output.push(line);
      continue;
    }
    if (inFence) {
      output.push(line);
      continue;
    }
    if (line.trim() === '') {
      flush();
      output.push('');
      continue;
    }
    if (BLOCK_START.test(line)) {
      flush();
      output.push(line);
      continue;
    }
    paragraph.push(line.trim());
  }
  flush();

  return output.join('\n');
};
