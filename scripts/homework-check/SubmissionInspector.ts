import * as path from "path";
import type { ArchiveCheck } from "./checks";
import { createDefaultChecks } from "./checks";
import type { CheckConfig } from "./config";
import { extractStudentId } from "./config";
import { SubmissionArchive } from "./SubmissionArchive";
import { SubmissionError } from "./SubmissionError";

/**
 * Per-submission report, written as JSON. Keys are snake_case on the wire.
 */
export interface SubmissionReport {
  student_id: string | null;
  filename: string;
  assignment: string;
  format_ok: boolean;
  format_issues: string[];
}

export class SubmissionInspector {
  private readonly config: CheckConfig;
  private readonly checks: ArchiveCheck[];

  constructor(config: CheckConfig, checks: ArchiveCheck[] = createDefaultChecks()) {
    this.config = config;
    this.checks = checks;
  }

  inspectFile(zipPath: string): SubmissionReport {
    return this.inspect(path.basename(zipPath), () => SubmissionArchive.open(zipPath));
  }

  inspectBuffer(filename: string, data: Buffer): SubmissionReport {
    return this.inspect(filename, () => SubmissionArchive.fromBuffer(filename, data));
  }

  private inspect(filename: string, openArchive: () => SubmissionArchive): SubmissionReport {
    const issues: string[] = [];

    try {
      const archive = openArchive();
      for (const check of this.checks) {
        issues.push(...check.run(archive, this.config));
      }
    } catch (error) {
      if (!(error instanceof SubmissionError)) {
        throw error;
      }
      issues.push(error.message);
    }

    const stem = path.basename(filename, path.extname(filename));
    return {
      student_id: extractStudentId(stem, this.config),
      filename,
      assignment: this.config.assignment,
      format_ok: issues.length === 0,
      format_issues: issues
    };
  }
}
