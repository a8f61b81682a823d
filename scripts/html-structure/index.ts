export { validateIndexHtml } from "./validateIndexHtml";
export type { ValidateOptions } from "./validateIndexHtml";
export { scanTags, TagScanner } from "./TagScanner";
export { StructuralMatcher } from "./StructuralMatcher";
export { LinkDetector, isStylesheetLink } from "./LinkDetector";
export { IssueCollector, createValidationResult } from "./IssueCollector";
export { formatIssue } from "./issueMessages";
export { REQUIRED_TAGS, isRequiredTag, issueCategory } from "./types";
export type {
  HtmlIssue,
  HtmlValidationResult,
  IssueCategory,
  IssueCode,
  RequiredTag,
  ScanEvent,
  SourcePosition,
  TagEvent,
  TagEventConsumer
} from "./types";
