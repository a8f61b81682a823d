import type { HtmlIssue, MalformedReason, SourcePosition } from "./types";
import { REQUIRED_TAGS } from "./types";

const MALFORMED_REASONS: Record<MalformedReason, string> = {
  "unterminated-tag": "tag is never closed with '>'",
  "unterminated-attribute": "attribute value is missing its closing quote",
  "unterminated-comment": "comment is never closed with '-->'",
  "unterminated-declaration": "declaration is never closed with '>'",
  "invalid-end-tag": "closing tag has no tag name"
};

const at = (position: SourcePosition): string => `line ${position.line}, column ${position.column}`;

/**
 * Renders an issue as the sentence a student sees in their report.
 */
export function formatIssue(issue: HtmlIssue, documentName: string = "index.html"): string {
  switch (issue.code) {
    case "unreadable":
      return `${documentName} is not readable as text.`;
    case "malformed-tag":
      return `Malformed markup at ${at(issue.position)}: ${MALFORMED_REASONS[issue.reason]} (near "${issue.excerpt}").`;
    case "mismatched":
      return `Mismatched closing tag </${issue.found}> at ${at(issue.position)} (expected </${issue.expected}> for the tag opened at line ${issue.openedAt.line}).`;
    case "unexpected-close":
      return `Unexpected closing tag </${issue.tag}> at ${at(issue.position)}.`;
    case "unclosed": {
      const extra = issue.count > 1 ? ` (${issue.count} left open)` : "";
      return `Unclosed tag <${issue.tag}> opened at ${at(issue.position)}${extra}.`;
    }
    case "missing-required":
      return `${documentName} is missing <${issue.tag}> tag.`;
    case "bad-order": {
      const canonical = REQUIRED_TAGS.filter((tag) => issue.observed.includes(tag));
      const found = issue.observed.every((tag, index) => tag === canonical[index])
        ? "<body> opened before </head>"
        : issue.observed.map((tag) => `<${tag}>`).join(", ");
      return `${documentName} has an unexpected order of <html>, <head>, and <body> tags (found ${found}).`;
    }
    case "no-css-link":
      return `${documentName} does not link to a CSS file.`;
  }
}
