import * as fs from "fs";
import * as path from "path";
import { promisify } from "util";
import type { CheckConfig } from "./config";
import type { SubmissionReport } from "./SubmissionInspector";
import { SubmissionInspector } from "./SubmissionInspector";
import { ensureDir, writeReport, writeSummary } from "./ReportWriter";

const readdir = promisify(fs.readdir);
const stat = promisify(fs.stat);

export interface WrittenReport {
  report: SubmissionReport;
  outputPath: string;
}

export interface SubmissionFailure {
  filename: string;
  message: string;
}

export interface RunResult {
  reports: WrittenReport[];
  failures: SubmissionFailure[];
  summaryPath: string | null;
}

export interface RunOptions {
  submissionsDir: string;
  reportsDir: string;
  config: CheckConfig;
  inspector?: SubmissionInspector;
  onReport?: (written: WrittenReport) => void;
  onFailure?: (failure: SubmissionFailure) => void;
}

/** `.zip` files directly inside dir, sorted by name */
export async function findSubmissionArchives(dir: string): Promise<string[]> {
  const entries: string[] = (await readdir(dir)).sort();
  const results: string[] = [];

  for (const entry of entries) {
    const fullPath: string = path.join(dir, entry);
    if (path.extname(entry).toLowerCase() !== ".zip") {
      continue;
    }
    const st = await stat(fullPath);
    if (st.isFile()) {
      results.push(fullPath);
    }
  }

  return results;
}

/**
 * Checks every archive in the submissions directory and writes one JSON
 * report each. A failure on one archive is recorded and the rest still run.
 */
export async function runSubmissionChecks(options: RunOptions): Promise<RunResult> {
  const { submissionsDir, reportsDir, config } = options;
  const inspector = options.inspector ?? new SubmissionInspector(config);
  const result: RunResult = { reports: [], failures: [], summaryPath: null };

  await ensureDir(reportsDir);

  for (const zipPath of await findSubmissionArchives(submissionsDir)) {
    const filename = path.basename(zipPath);
    try {
      const report = inspector.inspectFile(zipPath);
      const outputPath = await writeReport(reportsDir, path.basename(zipPath, path.extname(zipPath)), report);
      const written: WrittenReport = { report, outputPath };
      result.reports.push(written);
      options.onReport?.(written);
    } catch (error) {
      const failure: SubmissionFailure = {
        filename,
        message: error instanceof Error ? error.message : "Unknown error"
      };
      result.failures.push(failure);
      options.onFailure?.(failure);
    }
  }

  if (config.summary) {
    result.summaryPath = await writeSummary(
      reportsDir,
      config.assignment,
      result.reports.map((written) => written.report)
    );
  }

  return result;
}
