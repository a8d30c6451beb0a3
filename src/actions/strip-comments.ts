import { commentSyntaxFor, scanCode } from './code-scanner';
import type { ActionHandler } from './types';

// Placeholder for a removed comment; a private-use code point never found in source
const REMOVED = '\uE000';

function isShebang(text: string, index: number): boolean {
  return index === 0 && text.startsWith('#!');
}

/*
 * Removes comments while leaving string literals intact. A line that held
 * only a comment is dropped entirely; code that shared a line with a
 * comment keeps its line, minus trailing whitespace.
 */
export const stripComments: ActionHandler = (content, _settings, context) => {
  const syntax = commentSyntaxFor(context.extension);
  if (!syntax) return content;

  const segments = scanCode(content, syntax);
  if (!segments.some((segment, index) => segment.kind === 'comment' && !isShebang(segment.text, index))) {
    return content;
  }

  const marked = segments
    .map((segment, index) =>
      segment.kind === 'comment' && !isShebang(segment.text, index) ? REMOVED : segment.text
    )
    .join('');

  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const kept: string[] = [];
  for (const line of marked.split(/\r?\n/)) {
    if (!line.includes(REMOVED)) {
      kept.push(line);
      continue;
    }
    const cleaned = line.split(REMOVED).join('').trimEnd();
    if (cleaned.trim() !== '') kept.push(cleaned);
  }
  return kept.join(eol);
};
