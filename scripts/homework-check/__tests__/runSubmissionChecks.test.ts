import * as fs from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { findSubmissionArchives, runSubmissionChecks } from "../runSubmissionChecks";
import { SubmissionInspector } from "../SubmissionInspector";
import { createDefaultChecks } from "../checks";
import type { ArchiveCheck } from "../checks";
import { parseCheckConfig } from "../config";
import { serializeReport, SUMMARY_FILENAME } from "../ReportWriter";
import { VALID_INDEX, buildZip, makeTempDir } from "./zipFixtures";

let root: string;
let submissionsDir: string;
let reportsDir: string;

beforeEach(() => {
  root = makeTempDir();
  submissionsDir = path.join(root, "submissions");
  reportsDir = path.join(root, "reports", "hw1");
  fs.mkdirSync(submissionsDir);

  fs.writeFileSync(path.join(submissionsDir, "b.zip"), buildZip({ "index.html": VALID_INDEX, "style.css": "" }));
  fs.writeFileSync(path.join(submissionsDir, "a.zip"), buildZip({ "index.html": VALID_INDEX }));
  fs.writeFileSync(path.join(submissionsDir, "broken.zip"), "not a zip");
  fs.writeFileSync(path.join(submissionsDir, "Upper.ZIP"), buildZip({ "style.css": "" }));
  fs.writeFileSync(path.join(submissionsDir, "notes.txt"), "ignore me");
  fs.mkdirSync(path.join(submissionsDir, "folder.zip"));
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe("findSubmissionArchives", () => {
  it("lists zip files only, sorted by name", async () => {
    const archives = await findSubmissionArchives(submissionsDir);
    expect(archives.map((archive) => path.basename(archive))).toEqual(["Upper.ZIP", "a.zip", "b.zip", "broken.zip"]);
  });
});

describe("runSubmissionChecks", () => {
  it("writes one JSON report per archive", async () => {
    const result = await runSubmissionChecks({ submissionsDir, reportsDir, config: parseCheckConfig({}) });

    expect(result.failures).toEqual([]);
    expect(result.summaryPath).toBeNull();
    expect(result.reports.map((written) => written.report.filename)).toEqual([
      "Upper.ZIP",
      "a.zip",
      "b.zip",
      "broken.zip"
    ]);
    expect(fs.readdirSync(reportsDir).sort()).toEqual(["Upper.json", "a.json", "b.json", "broken.json"]);

    const expected = {
      student_id: null,
      filename: "a.zip",
      assignment: "hw1",
      format_ok: false,
      format_issues: ["No style.css found. Expected style.css at root or css/style.css."]
    };
    expect(fs.readFileSync(path.join(reportsDir, "a.json"), { encoding: "utf8" })).toBe(serializeReport(expected));

    const broken = JSON.parse(fs.readFileSync(path.join(reportsDir, "broken.json"), { encoding: "utf8" }));
    expect(broken.format_issues).toEqual(["Could not open zip file (corrupted or invalid)."]);
    expect(result.reports[2].report.format_ok).toBe(true);
  });

  it("keeps going after an unexpected failure", async () => {
    const exploding: ArchiveCheck = {
      name: "exploding",
      run: (archive) => {
        if (archive.filename === "a.zip") {
          throw new Error("boom");
        }
        return [];
      }
    };
    const config = parseCheckConfig({});
    const inspector = new SubmissionInspector(config, [exploding, ...createDefaultChecks()]);
    const failures: string[] = [];

    const result = await runSubmissionChecks({
      submissionsDir,
      reportsDir,
      config,
      inspector,
      onFailure: (failure) => failures.push(failure.filename)
    });

    expect(result.failures).toEqual([{ filename: "a.zip", message: "boom" }]);
    expect(failures).toEqual(["a.zip"]);
    expect(result.reports.map((written) => written.report.filename)).toEqual(["Upper.ZIP", "b.zip", "broken.zip"]);
    expect(fs.existsSync(path.join(reportsDir, "a.json"))).toBe(false);
  });

  it("writes an HTML summary when enabled", async () => {
    const result = await runSubmissionChecks({
      submissionsDir,
      reportsDir,
      config: parseCheckConfig({ summary: true })
    });

    expect(result.summaryPath).toBe(path.join(reportsDir, SUMMARY_FILENAME));
    const html = fs.readFileSync(path.join(reportsDir, SUMMARY_FILENAME), { encoding: "utf8" });
    expect(html).toContain("<p>1 of 4 submissions passed.</p>");
  });
});
