import type { ArchiveCheck } from "./ArchiveCheck";
import type { SubmissionArchive } from "../SubmissionArchive";
import type { CheckConfig } from "../config";
import { SubmissionError } from "../SubmissionError";
import { validateIndexHtml } from "../../html-structure";

/**
 * Reads the index page and runs the structural validator over it.
 * A missing index is reported by IndexMemberCheck, so it is skipped here.
 */
export class IndexDocumentCheck implements ArchiveCheck {
  name = "index-document";

  run(archive: SubmissionArchive, config: CheckConfig): string[] {
    if (!archive.has(config.indexMember)) {
      return [];
    }

    let content: Buffer;
    try {
      content = archive.read(config.indexMember);
    } catch (error) {
      if (error instanceof SubmissionError) {
        return [error.message];
      }
      throw error;
    }

    return validateIndexHtml(content, { documentName: config.indexMember }).formatIssues;
  }
}
