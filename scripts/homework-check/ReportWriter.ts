import * as fs from "fs";
import * as path from "path";
import { promisify } from "util";
import Handlebars from "handlebars";
import type { SubmissionReport } from "./SubmissionInspector";
import { SUMMARY_TEMPLATE } from "./summaryTemplate";

const writeFile = promisify(fs.writeFile);
const mkdir = promisify(fs.mkdir);

export const SUMMARY_FILENAME = "summary.html";

/** Ensure a directory exists (mkdir -p behavior) */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await mkdir(dirPath, { recursive: true });
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      return;
    }
    throw error;
  }
}

export function serializeReport(report: SubmissionReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/** Writes `<reportsDir>/<stem>.json` and returns its path */
export async function writeReport(reportsDir: string, stem: string, report: SubmissionReport): Promise<string> {
  const outPath: string = path.join(reportsDir, `${stem}.json`);
  await writeFile(outPath, serializeReport(report), { encoding: "utf8" });
  return outPath;
}

const summaryEnvironment = Handlebars.create();

summaryEnvironment.registerHelper("pluralize", (count: unknown, noun: unknown): string => {
  const amount = typeof count === "number" ? count : 0;
  return `${amount} ${String(noun)}${amount === 1 ? "" : "s"}`;
});

const renderSummaryTemplate = summaryEnvironment.compile(SUMMARY_TEMPLATE);

export function renderSummary(assignment: string, reports: readonly SubmissionReport[]): string {
  return renderSummaryTemplate({
    assignment,
    reports,
    total: reports.length,
    passed: reports.filter((report) => report.format_ok).length
  });
}

/** Writes the HTML overview of a run and returns its path */
export async function writeSummary(
  reportsDir: string,
  assignment: string,
  reports: readonly SubmissionReport[]
): Promise<string> {
  const outPath: string = path.join(reportsDir, SUMMARY_FILENAME);
  await writeFile(outPath, renderSummary(assignment, reports), { encoding: "utf8" });
  return outPath;
}
