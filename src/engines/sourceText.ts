/**
 * Source Text Codec
 *
 * Source files are scanned as latin1 strings: one character per byte. Spans
 * are then byte offsets, and encoding the rebuilt string as latin1 reproduces
 * every untouched byte exactly (BOMs, CRLF, even invalid UTF-8).
 *
 * Comment text crosses to the correction service as UTF-8, so it is
 * converted at that boundary only.
 */

/**
 * Bytes to scanner text (one char per byte)
 */
export function decodeSource(bytes: Buffer): string {
  return bytes.toString('latin1');
}

/**
 * Scanner text back to bytes
 */
export function encodeSource(text: string): Buffer {
  return Buffer.from(text, 'latin1');
}

/**
 * Byte-per-char slice to a real string for the correction service
 */
export function toServiceText(byteText: string): string {
  return Buffer.from(byteText, 'latin1').toString('utf8');
}

/**
 * Corrected string from the service to byte-per-char form
 */
export function fromServiceText(text: string): string {
  return Buffer.from(text, 'utf8').toString('latin1');
}
