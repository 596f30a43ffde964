/**
 * msgate — Attachments
 */

export interface Attachment {
  readonly mimeType: string;
  readonly url: string;
}

/** How the provider carries an attachment. */
export type MediaCategory = 'image' | 'sticker' | 'audio' | 'video' | 'document';

const MIME_PREFIX = /^[\w.+-]+(\/[\w.+-]+)?$/;

/**
 * Split a `mime/type:url` string. Returns undefined when there is no
 * mime prefix (e.g. a bare `https://...` URL).
 */
export function splitAttachment(value: string): Attachment | undefined {
  const colon = value.indexOf(':');
  if (colon <= 0) return undefined;

  const mimeType = value.slice(0, colon);
  const url = value.slice(colon + 1);
  if (!MIME_PREFIX.test(mimeType) || url.length === 0 || url.startsWith('//')) {
    return undefined;
  }
  return { mimeType, url };
}

/**
 * Map a mime type onto a provider media category. `application/*` and
 * `text/*` travel as documents; webp images as stickers. Unknown top-level
 * types return undefined.
 */
export function mediaCategory(mimeType: string): MediaCategory | undefined {
  const [type = '', format = ''] = mimeType.toLowerCase().split('/');
  switch (type) {
    case 'image':
      return format === 'webp' ? 'sticker' : 'image';
    case 'audio':
      return 'audio';
    case 'video':
      return 'video';
    case 'application':
    case 'text':
      return 'document';
    default:
      return undefined;
  }
}

/** Stickers and audio cannot carry a caption. */
export function acceptsCaption(category: MediaCategory): boolean {
  return category !== 'audio' && category !== 'sticker';
}
