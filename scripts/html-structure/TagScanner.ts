import type { MalformedMarkupEvent, MalformedReason, ScanEvent, StartTagEvent } from "./types";
import { LineIndex } from "./utils/LineIndex";
import { RAW_TEXT_ELEMENTS, createExcerpt } from "./utils/htmlElements";

const isWhitespace = (char: string | undefined): boolean =>
  char === " " || char === "\t" || char === "\n" || char === "\r" || char === "\f";

const isTagNameStart = (char: string | undefined): boolean =>
  char !== undefined && /[A-Za-z]/.test(char);

const isTagNameChar = (char: string | undefined): boolean =>
  char !== undefined && /[A-Za-z0-9\-:_.]/.test(char);

/**
 * Single-use lexer over one HTML document. Yields start, end and malformed
 * events; text, comments and declarations are skipped.
 */
export class TagScanner {
  private readonly html: string;
  private readonly lines: LineIndex;
  private cursor: number;

  constructor(html: string) {
    this.html = html;
    this.lines = new LineIndex(html);
    this.cursor = 0;
  }

  *events(): Generator<ScanEvent, void, undefined> {
    while (this.cursor < this.html.length) {
      const open = this.html.indexOf("<", this.cursor);
      if (open === -1) {
        return;
      }

      this.cursor = open;
      const event = this.readMarkup();
      if (!event) {
        continue;
      }

      yield event;

      if (event.kind === "start" && !event.selfClosing && RAW_TEXT_ELEMENTS.has(event.name)) {
        this.skipRawText(event.name);
      }
    }
  }

  /** Reads whatever begins at the `<` under the cursor and leaves the cursor past it */
  private readMarkup(): ScanEvent | null {
    const start = this.cursor;
    const next = this.html[start + 1];

    if (this.html.startsWith("<!--", start)) {
      const end = this.html.indexOf("-->", start + 4);
      if (end === -1) {
        return this.malformed("unterminated-comment", start, this.html.length);
      }
      this.cursor = end + 3;
      return null;
    }

    if (next === "!" || next === "?") {
      const end = this.html.indexOf(">", start + 2);
      if (end === -1) {
        return this.malformed("unterminated-declaration", start, this.html.length);
      }
      this.cursor = end + 1;
      return null;
    }

    if (next === "/") {
      return this.readEndTag(start);
    }

    if (isTagNameStart(next)) {
      return this.readStartTag(start);
    }

    // A bare `<` in text, e.g. "a < b"
    this.cursor = start + 1;
    return null;
  }

  private readEndTag(start: number): ScanEvent {
    const nameStart = start + 2;
    if (!isTagNameStart(this.html[nameStart])) {
      return this.malformed("invalid-end-tag", start, nameStart);
    }

    const nameEnd = this.readTagName(nameStart);
    const close = this.html.indexOf(">", nameEnd);
    const nextOpen = this.html.indexOf("<", nameEnd);

    if (close === -1 || (nextOpen !== -1 && nextOpen < close)) {
      return this.malformed("unterminated-tag", start, nextOpen === -1 ? this.html.length : nextOpen);
    }

    this.cursor = close + 1;
    return {
      kind: "end",
      name: this.html.slice(nameStart, nameEnd).toLowerCase(),
      position: this.lines.positionOf(start)
    };
  }

  private readStartTag(start: number): ScanEvent {
    const html = this.html;
    const nameEnd = this.readTagName(start + 1);
    const attributes = new Map<string, string>();
    let selfClosing = false;
    let i = nameEnd;

    while (true) {
      i = this.skipWhitespace(i);
      if (i >= html.length) {
        return this.malformed("unterminated-tag", start, html.length);
      }

      const char = html[i];
      if (char === ">") {
        i += 1;
        break;
      }
      if (char === "/") {
        if (html[i + 1] === ">") {
          selfClosing = true;
          i += 2;
          break;
        }
        i += 1;
        continue;
      }
      if (char === "<") {
        return this.malformed("unterminated-tag", start, i);
      }

      const attrStart = i;
      while (
        i < html.length &&
        !isWhitespace(html[i]) &&
        html[i] !== "/" &&
        html[i] !== ">" &&
        html[i] !== "=" &&
        html[i] !== "<"
      ) {
        i += 1;
      }
      if (i === attrStart) {
        // A stray "=" is read as the start of a name
        i += 1;
      }
      const attrName = html.slice(attrStart, i).toLowerCase();

      let value = "";
      i = this.skipWhitespace(i);
      if (html[i] === "=") {
        i = this.skipWhitespace(i + 1);
        const quote = html[i];

        if (quote === "\"" || quote === "'") {
          const closeQuote = html.indexOf(quote, i + 1);
          if (closeQuote === -1) {
            const resumeAt = html.indexOf("<", i + 1);
            return this.malformed("unterminated-attribute", start, resumeAt === -1 ? html.length : resumeAt);
          }
          value = html.slice(i + 1, closeQuote);
          i = closeQuote + 1;
        } else {
          const valueStart = i;
          while (i < html.length && !isWhitespace(html[i]) && html[i] !== ">") {
            i += 1;
          }
          value = html.slice(valueStart, i);
          // `href=style.css/>`: the slash closes the tag
          if (html[i] === ">" && value.endsWith("/")) {
            value = value.slice(0, -1);
            i -= 1;
          }
        }
      }

      if (!attributes.has(attrName)) {
        attributes.set(attrName, value);
      }
    }

    this.cursor = i;
    const event: StartTagEvent = {
      kind: "start",
      name: html.slice(start + 1, nameEnd).toLowerCase(),
      attributes,
      selfClosing,
      position: this.lines.positionOf(start)
    };
    return event;
  }

  private readTagName(from: number): number {
    let i = from;
    while (isTagNameChar(this.html[i])) {
      i += 1;
    }
    return i;
  }

  private skipWhitespace(from: number): number {
    let i = from;
    while (isWhitespace(this.html[i])) {
      i += 1;
    }
    return i;
  }

  /** Moves the cursor to the closing tag of a raw-text element, or to the end of input */
  private skipRawText(name: string): void {
    const closing = new RegExp(`</${name}(?=[\\s/>]|$)`, "ig");
    closing.lastIndex = this.cursor;
    const match = closing.exec(this.html);
    this.cursor = match ? match.index : this.html.length;
  }

  private malformed(reason: MalformedReason, start: number, resumeAt: number): MalformedMarkupEvent {
    this.cursor = Math.max(resumeAt, start + 1);
    return {
      kind: "malformed",
      reason,
      excerpt: createExcerpt(this.html, start, this.cursor),
      position: this.lines.positionOf(start)
    };
  }
}

/**
 * Lazily scans one document. Each call starts a fresh scanner.
 */
export function scanTags(html: string): Generator<ScanEvent, void, undefined> {
  return new TagScanner(html).events();
}
