import type { ArchiveCheck } from "./ArchiveCheck";
import type { SubmissionArchive } from "../SubmissionArchive";
import type { CheckConfig } from "../config";

export class IndexMemberCheck implements ArchiveCheck {
  name = "index-member";

  run(archive: SubmissionArchive, config: CheckConfig): string[] {
    return archive.has(config.indexMember) ? [] : [`No ${config.indexMember} found at zip root.`];
  }
}
