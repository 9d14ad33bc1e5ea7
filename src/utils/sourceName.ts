import type { SourceName } from '../types.js';

/**
 * Discovered sources are announced as `"HOST (logical)"`. Returns the text inside
 * the first parenthesised group, or the raw name when there is none.
 */
export function extractLogicalName(raw: SourceName): string {
  const open = raw.indexOf('(');
  if (open === -1) {
    return raw;
  }
  const close = raw.indexOf(')', open + 1);
  if (close === -1) {
    return raw;
  }
  return raw.slice(open + 1, close);
}

export function extractHostName(raw: SourceName): string {
  const open = raw.indexOf('(');
  return open === -1 ? raw : raw.slice(0, open).trim();
}
