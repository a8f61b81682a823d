import type { ArchiveCheck } from "./ArchiveCheck";
import { NestedArchiveCheck } from "./NestedArchiveCheck";
import { IndexMemberCheck } from "./IndexMemberCheck";
import { StylesheetMemberCheck } from "./StylesheetMemberCheck";
import { IndexDocumentCheck } from "./IndexDocumentCheck";

export type { ArchiveCheck } from "./ArchiveCheck";
export { NestedArchiveCheck, IndexMemberCheck, StylesheetMemberCheck, IndexDocumentCheck };

/**
 * Built-in checks in report order
 */
export function createDefaultChecks(): ArchiveCheck[] {
  return [
    new NestedArchiveCheck(),
    new IndexMemberCheck(),
    new StylesheetMemberCheck(),
    new IndexDocumentCheck()
  ];
}
