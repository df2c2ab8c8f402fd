/**
 * Line ending handling
 *
 * Merges run on LF text. The output takes CRLF back when the left revision
 * used it.
 */

export interface NormalizedText {
  text: string;
  crlf: boolean;
}

export function normalizeLineEndings(text: string): NormalizedText {
  const crlf = text.includes("\r\n");
  return { text: crlf ? text.replace(/\r\n/g, "\n") : text, crlf };
}

export function imitateLineEndings(text: string, crlf: boolean): string {
  return crlf ? text.replace(/\r?\n/g, "\r\n") : text;
}
