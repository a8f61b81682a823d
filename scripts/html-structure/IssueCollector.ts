import type { HtmlIssue, HtmlValidationResult, IssueCode } from "./types";
import { REQUIRED_TAGS } from "./types";
import { formatIssue } from "./issueMessages";

/**
 * Report position of each issue kind. Issues within the same phase keep the
 * order they were added in, which for phase 0 is document order.
 */
const ISSUE_PHASES: Record<IssueCode, number> = {
  "unreadable": 0,
  "malformed-tag": 0,
  "mismatched": 0,
  "unexpected-close": 0,
  "unclosed": 1,
  "missing-required": 2,
  "bad-order": 3,
  "no-css-link": 4
};

const rankWithinPhase = (issue: HtmlIssue): number =>
  issue.code === "missing-required" ? REQUIRED_TAGS.indexOf(issue.tag) : 0;

export class IssueCollector {
  private readonly issues: HtmlIssue[];

  constructor() {
    this.issues = [];
  }

  add(issues: readonly HtmlIssue[]): void {
    this.issues.push(...issues);
  }

  ordered(): HtmlIssue[] {
    return [...this.issues].sort(
      (a, b) => ISSUE_PHASES[a.code] - ISSUE_PHASES[b.code] || rankWithinPhase(a) - rankWithinPhase(b)
    );
  }

  toResult(documentName?: string): HtmlValidationResult {
    return createValidationResult(this.ordered(), documentName);
  }
}

export function createValidationResult(
  issues: readonly HtmlIssue[],
  documentName?: string
): HtmlValidationResult {
  const formatIssues = issues.map((issue) => formatIssue(issue, documentName));
  return {
    formatOk: formatIssues.length === 0,
    formatIssues,
    issues
  };
}
