import { isComment, isDirective, isTag, type AnyNode } from 'domhandler';
import { loadHtml, walkNodes } from './html-document';
import type { ActionHandler } from './types';

/*
 * Removes markup but keeps element content. With an empty `stripTags`
 * list every tag goes, along with comments and doctypes; otherwise only
 * the listed elements are unwrapped. Tags named in `preserveTags` always
 * survive. Script and style bodies are text to the parser and come
 * through unchanged.
 */
export const stripTags: ActionHandler = (content, settings) => {
  const preserve = new Set(settings.preserveTags.map((tag) => tag.toLowerCase()));
  const targets = new Set(settings.stripTags.map((tag) => tag.toLowerCase()));
  const stripAll = targets.size === 0;

  const $ = loadHtml(content);
  const unwrap: AnyNode[] = [];
  const remove: AnyNode[] = [];

  walkNodes($.root().contents().toArray(), (node) => {
    if (isComment(node) || isDirective(node)) {
      if (stripAll) remove.push(node);
      return false;
    }
    if (isTag(node)) {
      const key = node.name.toLowerCase();
      if (!preserve.has(key) && (stripAll || targets.has(key))) unwrap.push(node);
    }
    return true;
  });

  for (const node of remove) $(node).remove();
  // Innermost first
  for (const node of unwrap.reverse()) {
    const element = $(node);
    element.replaceWith(element.contents());
  }
  return $.html();
};
