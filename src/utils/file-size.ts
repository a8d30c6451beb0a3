const UNITS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4,
};

/*
 * Parses "500KB", "1.5 GB" or "2048" into bytes. Returns null when the
 * string is not a size.
 */
export function parseFileSize(value: string): number | null {
  const m = value.trim().toUpperCase().match(/^(\d+(?:\.\d+)?)\s*([KMGT]?B)?$/);
  if (!m || !m[1]) return null;
  const amount = Number.parseFloat(m[1]);
  const multiplier = UNITS[m[2] ?? 'B'];
  if (multiplier === undefined) return null;
  return Math.floor(amount * multiplier);
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 ** 2) return `${(bytes / 1024).toFixed(2)} KB`;
  if (bytes < 1024 ** 3) return `${(bytes / 1024 ** 2).toFixed(2)} MB`;
  return `${(bytes / 1024 ** 3).toFixed(2)} GB`;
}
