import { describe, expect, it } from "vitest";
import { renderSummary, serializeReport } from "../ReportWriter";
import type { SubmissionReport } from "../SubmissionInspector";

const passing: SubmissionReport = {
  student_id: "s001",
  filename: "alice.zip",
  assignment: "hw1",
  format_ok: true,
  format_issues: []
};

const failing: SubmissionReport = {
  student_id: null,
  filename: "bob.zip",
  assignment: "hw1",
  format_ok: false,
  format_issues: ["index.html is missing <head> tag."]
};

describe("serializeReport", () => {
  it("writes indented JSON with a trailing newline", () => {
    expect(serializeReport(failing)).toBe(
      [
        "{",
        "  \"student_id\": null,",
        "  \"filename\": \"bob.zip\",",
        "  \"assignment\": \"hw1\",",
        "  \"format_ok\": false,",
        "  \"format_issues\": [",
        "    \"index.html is missing <head> tag.\"",
        "  ]",
        "}",
        ""
      ].join("\n")
    );
  });
});

describe("renderSummary", () => {
  const html = renderSummary("hw1", [passing, failing]);

  it("counts passing submissions", () => {
    expect(html).toContain("<p>1 of 2 submissions passed.</p>");
  });

  it("renders one row per report", () => {
    expect(html).toContain("<td>alice.zip</td>");
    expect(html).toContain("<td>s001</td>");
    expect(html).toContain("<td>bob.zip</td>");
    expect(html).toContain("<td>-</td>");
    expect(html).toContain("<td>1 issue</td>");
  });

  it("escapes issue text", () => {
    expect(html).toContain("<li>index.html is missing &lt;head&gt; tag.</li>");
  });
});
