import type { HtmlValidationResult, TagEventConsumer } from "./types";
import { scanTags } from "./TagScanner";
import { StructuralMatcher } from "./StructuralMatcher";
import { LinkDetector } from "./LinkDetector";
import { IssueCollector, createValidationResult } from "./IssueCollector";
import { decodeDocument } from "./utils/decodeDocument";

export interface ValidateOptions {
  /** Name used in messages, e.g. "index.html" */
  documentName?: string;
}

/**
 * Validates the structure of one homework page in a single pass over its tags.
 * Never throws for present-but-broken input; every defect becomes an issue.
 */
export function validateIndexHtml(
  input: string | Uint8Array,
  options: ValidateOptions = {}
): HtmlValidationResult {
  const text = decodeDocument(input);
  if (text === null) {
    return createValidationResult([{ code: "unreadable" }], options.documentName);
  }

  const consumers: TagEventConsumer[] = [new StructuralMatcher(), new LinkDetector()];
  const collector = new IssueCollector();

  for (const event of scanTags(text)) {
    if (event.kind === "malformed") {
      collector.add([
        { code: "malformed-tag", reason: event.reason, excerpt: event.excerpt, position: event.position }
      ]);
      continue;
    }

    for (const consumer of consumers) {
      collector.add(consumer.consume(event));
    }
  }

  for (const consumer of consumers) {
    collector.add(consumer.finish());
  }

  return collector.toResult(options.documentName);
}
