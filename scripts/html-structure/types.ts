/**
 * Tags every homework document must open, in the order they must first appear.
 */
export const REQUIRED_TAGS = ["html", "head", "body"] as const;

export type RequiredTag = (typeof REQUIRED_TAGS)[number];

const REQUIRED_TAG_SET: ReadonlySet<string> = new Set<string>(REQUIRED_TAGS);

export function isRequiredTag(name: string): name is RequiredTag {
  return REQUIRED_TAG_SET.has(name);
}

export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

export interface StartTagEvent {
  kind: "start";
  name: string;
  attributes: ReadonlyMap<string, string>;
  selfClosing: boolean;
  position: SourcePosition;
}

export interface EndTagEvent {
  kind: "end";
  name: string;
  position: SourcePosition;
}

export type TagEvent = StartTagEvent | EndTagEvent;

export type MalformedReason =
  | "unterminated-tag"
  | "unterminated-attribute"
  | "unterminated-comment"
  | "unterminated-declaration"
  | "invalid-end-tag";

export interface MalformedMarkupEvent {
  kind: "malformed";
  reason: MalformedReason;
  excerpt: string;
  position: SourcePosition;
}

/**
 * Everything the scanner yields: tag events plus malformed regions it skipped over.
 */
export type ScanEvent = TagEvent | MalformedMarkupEvent;

export type HtmlIssue =
  | { code: "malformed-tag"; reason: MalformedReason; excerpt: string; position: SourcePosition }
  | { code: "mismatched"; expected: string; found: string; position: SourcePosition; openedAt: SourcePosition }
  | { code: "unexpected-close"; tag: string; position: SourcePosition }
  | { code: "unclosed"; tag: string; position: SourcePosition; count: number }
  | { code: "missing-required"; tag: RequiredTag }
  | { code: "bad-order"; observed: RequiredTag[] }
  | { code: "no-css-link" }
  | { code: "unreadable" };

export type IssueCode = HtmlIssue["code"];

export type IssueCategory = "document" | "scan" | "structural" | "content";

const ISSUE_CATEGORIES: Record<IssueCode, IssueCategory> = {
  "unreadable": "document",
  "malformed-tag": "scan",
  "mismatched": "structural",
  "unexpected-close": "structural",
  "unclosed": "structural",
  "missing-required": "structural",
  "bad-order": "structural",
  "no-css-link": "content"
};

export function issueCategory(issue: HtmlIssue): IssueCategory {
  return ISSUE_CATEGORIES[issue.code];
}

/**
 * Anything that folds the tag stream into issues. `consume` sees events in
 * document order; `finish` is called once after the last event.
 */
export interface TagEventConsumer {
  consume(event: TagEvent): readonly HtmlIssue[];
  finish(): readonly HtmlIssue[];
}

export interface HtmlValidationResult {
  formatOk: boolean;
  formatIssues: string[];
  issues: readonly HtmlIssue[];
}
