import { describe, expect, it } from "vitest";
import { IssueCollector } from "../IssueCollector";
import { issueCategory } from "../types";
import type { HtmlIssue } from "../types";

const position = { offset: 0, line: 1, column: 1 };

describe("IssueCollector", () => {
  it("orders issues by phase and required tags canonically", () => {
    const collector = new IssueCollector();
    collector.add([{ code: "no-css-link" }, { code: "missing-required", tag: "body" }]);
    collector.add([{ code: "bad-order", observed: ["head", "html"] }]);
    collector.add([{ code: "missing-required", tag: "html" }]);
    collector.add([{ code: "unexpected-close", tag: "p", position }]);
    collector.add([{ code: "unclosed", tag: "div", position, count: 1 }]);
    collector.add([{ code: "malformed-tag", reason: "unterminated-tag", excerpt: "<p", position }]);

    const ordered = collector.ordered();
    expect(ordered.map((issue) => issue.code)).toEqual([
      "unexpected-close",
      "malformed-tag",
      "unclosed",
      "missing-required",
      "missing-required",
      "bad-order",
      "no-css-link"
    ]);
    expect(ordered.filter((issue) => issue.code === "missing-required")).toEqual([
      { code: "missing-required", tag: "html" },
      { code: "missing-required", tag: "body" }
    ]);
  });

  it("derives formatOk from the rendered issues", () => {
    expect(new IssueCollector().toResult()).toEqual({ formatOk: true, formatIssues: [], issues: [] });

    const collector = new IssueCollector();
    collector.add([{ code: "no-css-link" }]);
    expect(collector.toResult("page.html")).toEqual({
      formatOk: false,
      formatIssues: ["page.html does not link to a CSS file."],
      issues: [{ code: "no-css-link" }]
    });
  });
});

describe("issueCategory", () => {
  it("groups issue codes", () => {
    const issues: HtmlIssue[] = [
      { code: "unreadable" },
      { code: "malformed-tag", reason: "unterminated-comment", excerpt: "<!--", position },
      { code: "bad-order", observed: ["body", "html"] },
      { code: "no-css-link" }
    ];
    expect(issues.map(issueCategory)).toEqual(["document", "scan", "structural", "content"]);
  });
});
