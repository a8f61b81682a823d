import type { SubmissionArchive } from "../SubmissionArchive";
import type { CheckConfig } from "../config";

/**
 * Interface for archive checks. Each returns the report lines it contributes, in order.
 */
export interface ArchiveCheck {
  name: string;
  run(archive: SubmissionArchive, config: CheckConfig): string[];
}
