import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import AdmZip from "adm-zip";

export const VALID_INDEX = [
  "<!DOCTYPE html>",
  "<html>",
  "<head><link rel=\"stylesheet\" href=\"style.css\"></head>",
  "<body><h1>Homework</h1></body>",
  "</html>"
].join("\n");

/** Builds an in-memory ZIP with the given members */
export function buildZip(members: Record<string, string | Buffer>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(members)) {
    zip.addFile(name, typeof content === "string" ? Buffer.from(content, "utf8") : content);
  }
  return zip.toBuffer();
}

export function makeTempDir(prefix: string = "homework-check-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}
