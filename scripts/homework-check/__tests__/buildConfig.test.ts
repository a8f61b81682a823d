import * as fs from "fs";
import * as path from "path";
import JSON5 from "json5";
import { describe, expect, it } from "vitest";

interface BuildConfig {
  extends: string;
  include: string[];
  exclude: string[];
}

describe("tsconfig.build.json", () => {
  const config: BuildConfig = JSON5.parse(
    fs.readFileSync(path.resolve(__dirname, "../../../tsconfig.build.json"), { encoding: "utf8" })
  );

  it("emits the scripts without their tests or the runner config", () => {
    expect(config.extends).toBe("./tsconfig.json");
    expect(config.include).toEqual(["scripts/**/*.ts"]);
    expect(config.exclude).toContain("scripts/**/__tests__/**");
  });
});
