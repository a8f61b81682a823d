export { main, parseArguments, resolveUserPath, USAGE } from "./cli";
export type { CliArguments, ParsedArguments } from "./cli";
export { CheckConfigSchema, DEFAULT_CONFIG_FILE, extractStudentId, loadCheckConfig, parseCheckConfig } from "./config";
export type { CheckConfig } from "./config";
export { ConfigError } from "./ConfigError";
export { SubmissionError } from "./SubmissionError";
export { SubmissionArchive, OPEN_FAILURE_MESSAGE } from "./SubmissionArchive";
export { SubmissionInspector } from "./SubmissionInspector";
export type { SubmissionReport } from "./SubmissionInspector";
export { findSubmissionArchives, runSubmissionChecks } from "./runSubmissionChecks";
export type { RunOptions, RunResult, SubmissionFailure, WrittenReport } from "./runSubmissionChecks";
export { renderSummary, serializeReport, writeReport, writeSummary, SUMMARY_FILENAME } from "./ReportWriter";
export { createDefaultChecks } from "./checks";
export type { ArchiveCheck } from "./checks";
