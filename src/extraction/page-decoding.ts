import { TextDecoder } from "util";
import { RawPage } from "../external-apis/pool-page/pool-page.types";

// A <meta> charset declaration must sit within the first 1024 bytes
const SNIFF_BYTES = 1024;

/**
 * Determines the character set of a page: Content-Type header first, then a
 * <meta charset> / http-equiv declaration, then UTF-8.
 */
export function detectCharset(page: RawPage): string {
  const fromHeader = page.contentType?.match(/charset=["']?([\w-]+)/i);
  if (fromHeader) {
    return fromHeader[1].toLowerCase();
  }

  const head = page.body.subarray(0, SNIFF_BYTES).toString("latin1");
  const fromMeta = head.match(/<meta[^>]+charset=["']?([\w-]+)/i);
  if (fromMeta) {
    return fromMeta[1].toLowerCase();
  }

  return "utf-8";
}

/**
 * Decodes the page body. Unknown charsets fall back to UTF-8 and invalid bytes
 * become U+FFFD, so decoding never throws.
 */
export function decodePage(page: RawPage): string {
  const charset = detectCharset(page);
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(page.body);
}
