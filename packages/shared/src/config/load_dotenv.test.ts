import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { loadDotEnvIfPresent, parseEnvFile, parseEnvValue } from "./load_dotenv";

describe("parseEnvValue", () => {
  it("strips quotes and trailing comments", () => {
    expect(parseEnvValue(' "a # b" ')).toBe("a # b");
    expect(parseEnvValue("'single'")).toBe("single");
    expect(parseEnvValue("plain # note")).toBe("plain");
    expect(parseEnvValue("url#fragment")).toBe("url#fragment");
  });
});

describe("parseEnvFile", () => {
  it("skips comments and malformed lines", () => {
    const raw = "# comment\nexport FOO=1\n\nNOEQUALS\n=novalue\nBAR = two\r\n";
    expect(parseEnvFile(raw)).toEqual({ FOO: "1", BAR: "two" });
  });
});

describe("loadDotEnvIfPresent", () => {
  const keys = ["CW_TEST_A", "CW_TEST_B", "CW_TEST_PRESET"];
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "chunkwise-env-"));
  });

  afterEach(() => {
    for (const key of keys) delete process.env[key];
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads .env then .env.local without overriding what is set", () => {
    writeFileSync(join(dir, ".env"), "CW_TEST_A=from-env\nCW_TEST_PRESET=from-env\n");
    writeFileSync(join(dir, ".env.local"), "CW_TEST_A=from-local\nCW_TEST_B=from-local\n");
    process.env.CW_TEST_PRESET = "from-shell";

    loadDotEnvIfPresent(dir);

    expect(process.env.CW_TEST_A).toBe("from-env");
    expect(process.env.CW_TEST_B).toBe("from-local");
    expect(process.env.CW_TEST_PRESET).toBe("from-shell");
  });
});
