const REPLACEMENT_CHAR = "\uFFFD";
const MAX_REPLACEMENT_RATIO = 0.3;

/** UTF-16 needs its byte order mark; anything else with a NUL byte is binary */
function decodeBytes(bytes: Uint8Array): string | null {
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return new TextDecoder("utf-16le").decode(bytes);
  }
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return new TextDecoder("utf-16be").decode(bytes);
  }
  if (bytes.includes(0)) {
    return null;
  }
  return new TextDecoder("utf-8").decode(bytes);
}

/**
 * Best-effort decode (UTF-8, or UTF-16 with a byte order mark). Returns null
 * for content that is not text at all (NUL characters, or mostly undecodable
 * bytes).
 */
export function decodeDocument(input: string | Uint8Array): string | null {
  const text = typeof input === "string" ? input : decodeBytes(input);
  if (text === null) {
    return null;
  }
  if (text.includes("\u0000")) {
    return null;
  }

  if (text.length > 0) {
    let replacements = 0;
    for (const char of text) {
      if (char === REPLACEMENT_CHAR) {
        replacements += 1;
      }
    }
    if (replacements / text.length > MAX_REPLACEMENT_RATIO) {
      return null;
    }
  }

  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}
