import * as cheerio from 'cheerio';
import { hasChildren, type AnyNode } from 'domhandler';

/*
 * Parses HTML with htmlparser2 in HTML mode: raw-text elements (script,
 * style, textarea) keep their bodies as text, entities are left encoded,
 * and every node records its source offsets.
 */
export function loadHtml(content: string): cheerio.CheerioAPI {
  return cheerio.load(
    content,
    {
      xml: {
        xmlMode: false,
        decodeEntities: false,
        withStartIndices: true,
        withEndIndices: true,
      },
    },
    false
  );
}

/*
 * Depth-first walk. `visit` returns false to skip a node's children.
 */
export function walkNodes(nodes: AnyNode[], visit: (node: AnyNode) => boolean): void {
  for (const node of nodes) {
    if (visit(node) && hasChildren(node)) {
      walkNodes(node.children, visit);
    }
  }
}
