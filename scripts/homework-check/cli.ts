import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { CheckConfig } from "./config";
import { loadCheckConfig } from "./config";
import { ConfigError } from "./ConfigError";
import { runSubmissionChecks } from "./runSubmissionChecks";

export const USAGE = "Usage: check-format <submissions_dir> <reports_dir> [--config <file>] [--summary]";

export interface CliArguments {
  submissionsDir: string;
  reportsDir: string;
  configPath?: string;
  summary: boolean;
}

export type ParsedArguments = { ok: true; args: CliArguments } | { ok: false; message: string };

/** Expands a leading ~ and resolves against cwd */
export function resolveUserPath(input: string, cwd: string = process.cwd()): string {
  const expanded = input === "~" || input.startsWith("~/") ? path.join(os.homedir(), input.slice(1)) : input;
  return path.resolve(cwd, expanded);
}

export function parseArguments(argv: readonly string[]): ParsedArguments {
  const positionals: string[] = [];
  let configPath: string | undefined;
  let summary = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--summary") {
      summary = true;
    } else if (arg === "--config") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        return { ok: false, message: "--config requires a file path" };
      }
      configPath = value;
      i += 1;
    } else if (arg.startsWith("--")) {
      return { ok: false, message: `Unknown option: ${arg}` };
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length !== 2) {
    return { ok: false, message: USAGE };
  }

  return {
    ok: true,
    args: { submissionsDir: positionals[0], reportsDir: positionals[1], configPath, summary }
  };
}

/**
 * Runs the format check over a submissions directory. Returns the process exit code.
 */
export async function main(argv: readonly string[] = process.argv.slice(2), cwd: string = process.cwd()): Promise<number> {
  const parsed = parseArguments(argv);
  if (!parsed.ok) {
    process.stderr.write(parsed.message === USAGE ? `${USAGE}\n` : `${parsed.message}\n${USAGE}\n`);
    return 1;
  }

  const submissionsDir = resolveUserPath(parsed.args.submissionsDir, cwd);
  const reportsDir = resolveUserPath(parsed.args.reportsDir, cwd);

  if (!fs.existsSync(submissionsDir) || !fs.statSync(submissionsDir).isDirectory()) {
    process.stderr.write(`Submissions directory does not exist or is not a directory: ${submissionsDir}\n`);
    return 1;
  }

  let config: CheckConfig;
  try {
    config = await loadCheckConfig(parsed.args.configPath, cwd);
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n`);
      return 1;
    }
    throw error;
  }
  if (parsed.args.summary) {
    config = { ...config, summary: true };
  }

  const result = await runSubmissionChecks({
    submissionsDir,
    reportsDir,
    config,
    onReport: ({ report, outputPath }) => {
      const status = report.format_ok ? "ok" : `${report.format_issues.length} issue(s)`;
      process.stdout.write(`[CHECK] ${report.filename} -> ${path.relative(cwd, outputPath)} (${status})\n`);
    },
    onFailure: ({ filename, message }) => {
      // eslint-disable-next-line no-console
      console.error(`[CHECK] Failed to check ${filename}:`, message);
    }
  });

  if (result.summaryPath) {
    process.stdout.write(`[CHECK] Summary written to ${path.relative(cwd, result.summaryPath)}\n`);
  }
  process.stdout.write(
    `[CHECK] ${result.reports.length} report(s) written, ${result.failures.length} failure(s).\n`
  );

  return result.failures.length > 0 ? 1 : 0;
}
