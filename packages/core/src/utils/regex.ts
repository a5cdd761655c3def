export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Letter or combining mark, for word-boundary checks in any script */
export const LETTER = '[\\p{L}\\p{M}]';
