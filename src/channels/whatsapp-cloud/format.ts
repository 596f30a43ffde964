/**
 * msgate — WhatsApp Cloud Text Formatting
 *
 * Cleanup applied to labels before they go on the wire.
 */

/**
 * Undo JSON-style escaping left in labels by upstream editors.
 * When the text contains `\/`, every backslash is dropped; otherwise
 * `\\` collapses to a single backslash.
 */
export function unescapeLabel(text: string): string {
  if (text.includes('\\/')) {
    return text.replaceAll('\\', '');
  }
  if (text.includes('\\\\')) {
    return text.replaceAll('\\\\', '\\');
  }
  return text;
}

/** Whether a text part should ask the provider for a link preview. */
export function hasLink(text: string): boolean {
  return text.includes('http://') || text.includes('https://');
}

/** First `max` code points of `text`. */
export function truncate(text: string, max: number): string {
  const codePoints = [...text];
  return codePoints.length <= max ? text : codePoints.slice(0, max).join('');
}
