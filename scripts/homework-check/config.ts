import * as fs from "fs";
import * as path from "path";
import { promisify } from "util";
import JSON5 from "json5";
import { z } from "zod";
import { ConfigError } from "./ConfigError";

const readFile = promisify(fs.readFile);

export const DEFAULT_CONFIG_FILE = "homework-check.config.json5";

export const CheckConfigSchema = z
  .object({
    assignment: z.string().min(1).default("hw1"),
    indexMember: z.string().min(1).default("index.html"),
    stylesheetMembers: z.array(z.string().min(1)).min(1).default(["style.css", "css/style.css"]),
    studentIdPattern: z
      .string()
      .nullable()
      .default(null)
      .refine((pattern) => pattern === null || isValidPattern(pattern), {
        message: "must be a valid regular expression"
      }),
    summary: z.boolean().default(false)
  })
  .strict();

export type CheckConfig = z.infer<typeof CheckConfigSchema>;

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validates raw config data (already parsed from JSON5) and fills in defaults.
 */
export function parseCheckConfig(raw: unknown, configPath: string = "<inline>"): CheckConfig {
  const result = CheckConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const key = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${key}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid config in ${configPath}`, configPath, problems);
  }
  return result.data;
}

/**
 * Loads the check configuration.
 * An explicit path must exist; otherwise the default file in `cwd` is used if present, else defaults.
 */
export async function loadCheckConfig(configPath?: string, cwd: string = process.cwd()): Promise<CheckConfig> {
  const resolved = configPath ? path.resolve(cwd, configPath) : path.join(cwd, DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolved)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${resolved}`, resolved);
    }
    return parseCheckConfig({});
  }

  let raw: unknown;
  try {
    const content: string = await readFile(resolved, { encoding: "utf8" });
    raw = JSON5.parse(content);
  } catch (error) {
    const message: string = error instanceof Error ? error.message : "Unknown error";
    throw new ConfigError(`Could not read config ${resolved}: ${message}`, resolved);
  }

  return parseCheckConfig(raw, resolved);
}

/** Pulls the student id out of an archive's file stem using the configured pattern */
export function extractStudentId(stem: string, config: CheckConfig): string | null {
  if (config.studentIdPattern === null) {
    return null;
  }
  const match = new RegExp(config.studentIdPattern).exec(stem);
  return match?.[1] ?? null;
}
