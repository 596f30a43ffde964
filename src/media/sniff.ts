/**
 * msgate — Content Type Detection
 */

import { fileTypeFromBuffer } from 'file-type';

export const GENERIC_CONTENT_TYPE = 'application/octet-stream';

const GENERIC_HINTS = new Set(['', GENERIC_CONTENT_TYPE, 'application/zip', 'binary/octet-stream']);

function isGeneric(hint: string): boolean {
  return GENERIC_HINTS.has(hint.toLowerCase());
}

/**
 * Content type for uploaded bytes. The type detected from the bytes wins;
 * the hint is used when nothing is detected and it is specific.
 */
export async function sniffContentType(bytes: Uint8Array, hint?: string): Promise<string> {
  const detected = bytes.byteLength > 0 ? await fileTypeFromBuffer(bytes) : undefined;
  if (detected) return detected.mime;

  const base = hint?.split(';')[0]?.trim();
  if (base === undefined || isGeneric(base)) return GENERIC_CONTENT_TYPE;
  return base;
}
