import type { ActionHandler } from './types';

export const compressWhitespace: ActionHandler = (content) =>
  content.replace(/[ \t]+/g, ' ').replace(/(\r?\n)(?:[ \t]*\r?\n){2,}/g, '$1$1');

export const removeEmptyLines: ActionHandler = (content) => {
  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  return content
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '')
    .join(eol);
};
