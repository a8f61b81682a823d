import type {
  EndTagEvent,
  HtmlIssue,
  RequiredTag,
  SourcePosition,
  StartTagEvent,
  TagEvent,
  TagEventConsumer
} from "./types";
import { REQUIRED_TAGS, isRequiredTag } from "./types";
import { VOID_ELEMENTS } from "./utils/htmlElements";

interface TagFrame {
  tag: string;
  position: SourcePosition;
}

/**
 * Tracks the open-tag stack and the first-occurrence order of html/head/body.
 * A `<body>` opened before the first `</head>` is also a bad order.
 *
 * On a closing tag that does not match the top of the stack, the stack is cut
 * back to the nearest matching ancestor (one `mismatched` issue per frame
 * skipped). A closing tag with no matching ancestor is `unexpected-close` and
 * leaves the stack alone, so later structure is still checked normally.
 */
export class StructuralMatcher implements TagEventConsumer {
  private readonly stack: TagFrame[];
  private readonly present: Set<RequiredTag>;
  private readonly firstOpened: Map<RequiredTag, number>;
  private readonly firstSelfClosed: Map<RequiredTag, number>;
  private readonly closed: Set<RequiredTag>;
  private sequence: number;
  private firstBodyStart: number | null;
  private firstHeadClose: number | null;

  constructor() {
    this.stack = [];
    this.present = new Set();
    this.firstOpened = new Map();
    this.firstSelfClosed = new Map();
    this.closed = new Set();
    this.sequence = 0;
    this.firstBodyStart = null;
    this.firstHeadClose = null;
  }

  consume(event: TagEvent): readonly HtmlIssue[] {
    return event.kind === "start" ? this.handleStart(event) : this.handleEnd(event);
  }

  finish(): readonly HtmlIssue[] {
    const issues: HtmlIssue[] = [];

    const unclosed = new Map<string, { position: SourcePosition; count: number }>();
    for (const frame of this.stack) {
      const existing = unclosed.get(frame.tag);
      if (existing) {
        existing.count += 1;
      } else {
        unclosed.set(frame.tag, { position: frame.position, count: 1 });
      }
    }
    for (const [tag, { position, count }] of unclosed) {
      issues.push({ code: "unclosed", tag, position, count });
    }

    for (const tag of REQUIRED_TAGS) {
      if (!this.present.has(tag)) {
        issues.push({ code: "missing-required", tag });
      }
    }

    const observed = this.observedOrder();
    const expected = REQUIRED_TAGS.filter((tag) => observed.includes(tag));
    const bodyInsideHead =
      this.firstBodyStart !== null && this.firstHeadClose !== null && this.firstBodyStart < this.firstHeadClose;
    if (bodyInsideHead || observed.some((tag, index) => tag !== expected[index])) {
      issues.push({ code: "bad-order", observed });
    }

    return issues;
  }

  private handleStart(event: StartTagEvent): readonly HtmlIssue[] {
    const isVoid = event.selfClosing || VOID_ELEMENTS.has(event.name);

    if (event.name === "body" && this.firstBodyStart === null) {
      this.firstBodyStart = event.position.offset;
    }

    if (isRequiredTag(event.name)) {
      this.present.add(event.name);
      const firstSeen = isVoid ? this.firstSelfClosed : this.firstOpened;
      if (!firstSeen.has(event.name)) {
        firstSeen.set(event.name, this.sequence);
      }
      this.sequence += 1;
    }

    if (!isVoid) {
      this.stack.push({ tag: event.name, position: event.position });
    }
    return [];
  }

  private handleEnd(event: EndTagEvent): readonly HtmlIssue[] {
    const tag = event.name;
    if (VOID_ELEMENTS.has(tag)) {
      return [];
    }

    if (isRequiredTag(tag)) {
      this.closed.add(tag);
    }
    if (tag === "head" && this.firstHeadClose === null) {
      this.firstHeadClose = event.position.offset;
    }

    const top = this.stack[this.stack.length - 1];
    if (top && top.tag === tag) {
      this.stack.pop();
      return [];
    }

    let matchIndex = -1;
    for (let i = this.stack.length - 1; i >= 0; i--) {
      if (this.stack[i].tag === tag) {
        matchIndex = i;
        break;
      }
    }

    if (matchIndex === -1) {
      return [{ code: "unexpected-close", tag, position: event.position }];
    }

    const removed = this.stack.splice(matchIndex);
    return removed
      .slice(1)
      .reverse()
      .map((frame): HtmlIssue => ({
        code: "mismatched",
        expected: frame.tag,
        found: tag,
        position: event.position,
        openedAt: frame.position
      }));
  }

  /**
   * Required tags in the order they were first opened. A self-closed
   * `<head/>` only counts here when a `</head>` also shows up.
   */
  private observedOrder(): RequiredTag[] {
    const entries: Array<{ tag: RequiredTag; sequence: number }> = [];

    for (const tag of REQUIRED_TAGS) {
      const opened = this.firstOpened.get(tag);
      const selfClosed = this.closed.has(tag) ? this.firstSelfClosed.get(tag) : undefined;
      const sequence = opened ?? selfClosed;
      if (sequence !== undefined) {
        entries.push({ tag, sequence });
      }
    }

    return entries.sort((a, b) => a.sequence - b.sequence).map((entry) => entry.tag);
  }
}
