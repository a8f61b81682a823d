import type { ArchiveCheck } from "./ArchiveCheck";
import type { SubmissionArchive } from "../SubmissionArchive";

/**
 * Flags archives packed inside the submission.
 */
export class NestedArchiveCheck implements ArchiveCheck {
  name = "nested-archive";

  run(archive: SubmissionArchive): string[] {
    return archive.memberNames
      .filter((member) => member.toLowerCase().endsWith(".zip"))
      .map((member) => `Nested zip found: ${member}`);
  }
}
