/**
 * Text encoding detection for exported files.
 *
 * CRM exports produced on German Windows installations are usually
 * Windows-1252; everything else is read as UTF-8.
 */

import { detect } from 'chardet';
import iconv from 'iconv-lite';

export type TextEncodingName = 'utf-8' | 'cp1252';

const WINDOWS_FAMILY = new Set(['windows-1252', 'cp1252', 'iso-8859-1']);

/**
 * Guess the encoding of raw file bytes.
 */
export function detectEncoding(bytes: Uint8Array): TextEncodingName {
  const detected = detect(bytes);
  if (detected && WINDOWS_FAMILY.has(detected.toLowerCase())) {
    return 'cp1252';
  }
  return 'utf-8';
}

/**
 * Decode bytes to text. A leading byte order mark is dropped.
 *
 * @param encoding - 'auto' runs detection first
 */
export function decodeText(bytes: Buffer, encoding: TextEncodingName | 'auto' = 'auto'): string {
  const resolved = encoding === 'auto' ? detectEncoding(bytes) : encoding;
  return iconv.decode(bytes, resolved, { stripBOM: true });
}
