/**
 * Raised when the check configuration cannot be read or does not match the schema.
 */
export class ConfigError extends Error {
  public readonly configPath: string;
  public readonly problems: string[];

  constructor(message: string, configPath: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}\n  - ${problems.join("\n  - ")}` : message);
    this.name = "ConfigError";
    this.configPath = configPath;
    this.problems = problems;
  }
}
