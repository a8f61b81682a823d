/**
 * Archive-level failure. The message is written verbatim into the submission's report.
 */
export class SubmissionError extends Error {
  public readonly filename?: string;
  public readonly member?: string;

  constructor(message: string, filename?: string, member?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SubmissionError";
    this.filename = filename;
    this.member = member;
  }
}
