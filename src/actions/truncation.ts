const SCRAPE_FOOTER = /\n\n---\n\n\*Scraped from:.*?\*\n\n\*Scraped at:.*?\*\n\n\*Source URL:.*?\*\s*$/s;

/*
 * Drops the footer the HTML-to-Markdown scraper appends to each page.
 */
export function removeScrapedMetadata(content: string): string {
  return content.replace(SCRAPE_FOOTER, '');
}

/*
 * Keeps the first `maxLines` lines and appends a marker when anything was
 * cut. A trailing newline does not count as an extra line.
 */
export function truncateLines(content: string, maxLines: number): string {
  const lines = content.split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  if (lines.length <= maxLines) return content;
  return `${lines.slice(0, maxLines).join('\n')}\n... (truncated after ${maxLines} lines)`;
}
