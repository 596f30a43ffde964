/**
 * msgate — Text Splitting
 */

/**
 * Split `text` into parts of at most `limit` code points. Parts are cut
 * at the limit boundary, never inside a surrogate pair, so joining them
 * returns the original text. Empty text yields no parts.
 */
export function splitText(text: string, limit: number): string[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }
  if (text.length === 0) return [];

  const parts: string[] = [];
  let current = '';
  let count = 0;

  for (const codePoint of text) {
    if (count === limit) {
      parts.push(current);
      current = '';
      count = 0;
    }
    current += codePoint;
    count++;
  }
  parts.push(current);
  return parts;
}

