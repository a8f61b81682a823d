import * as path from "path";
import type { ArchiveCheck } from "./ArchiveCheck";
import type { SubmissionArchive } from "../SubmissionArchive";
import type { CheckConfig } from "../config";

/**
 * Requires one of the configured stylesheet members. Whether the page actually
 * links to it is the index document check's business.
 */
export class StylesheetMemberCheck implements ArchiveCheck {
  name = "stylesheet-member";

  run(archive: SubmissionArchive, config: CheckConfig): string[] {
    const members = config.stylesheetMembers;
    if (members.some((member) => archive.has(member))) {
      return [];
    }

    const expected = members.map((member) => (member.includes("/") ? member : `${member} at root`)).join(" or ");
    return [`No ${path.posix.basename(members[0])} found. Expected ${expected}.`];
  }
}
