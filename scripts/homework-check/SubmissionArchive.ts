import * as path from "path";
import AdmZip from "adm-zip";
import { SubmissionError } from "./SubmissionError";

export const OPEN_FAILURE_MESSAGE = "Could not open zip file (corrupted or invalid).";

/**
 * Read-only view of one submitted ZIP. Only the central directory is read up
 * front; member data is inflated on demand.
 */
export class SubmissionArchive {
  public readonly filename: string;
  private readonly zip: AdmZip;
  private readonly names: string[];

  private constructor(filename: string, zip: AdmZip) {
    this.filename = filename;
    this.zip = zip;
    this.names = zip.getEntries().map((entry) => entry.entryName);
  }

  static open(zipPath: string): SubmissionArchive {
    return SubmissionArchive.load(path.basename(zipPath), zipPath);
  }

  static fromBuffer(filename: string, data: Buffer): SubmissionArchive {
    return SubmissionArchive.load(filename, data);
  }

  private static load(filename: string, source: string | Buffer): SubmissionArchive {
    try {
      return new SubmissionArchive(filename, new AdmZip(source));
    } catch (error) {
      throw new SubmissionError(OPEN_FAILURE_MESSAGE, filename, undefined, error);
    }
  }

  /** Member names in central-directory order */
  get memberNames(): readonly string[] {
    return this.names;
  }

  has(member: string): boolean {
    return this.names.includes(member);
  }

  read(member: string): Buffer {
    const entry = this.zip.getEntry(member);
    if (!entry || entry.isDirectory) {
      throw new SubmissionError(`Could not read ${member} from the zip archive.`, this.filename, member);
    }

    try {
      return entry.getData();
    } catch (error) {
      throw new SubmissionError(`Could not read ${member} from the zip archive.`, this.filename, member, error);
    }
  }
}
