import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { getVersion, VERSION } from "../../src/version.js";

describe("getVersion", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "flowgate-version-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should read the CLI package version", () => {
    expect(VERSION).toBe("0.1.0");
  });

  it("should use the nearest package.json above the start directory", () => {
    const nested = path.join(tempDir, "dist", "cli", "src");
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(path.join(tempDir, "package.json"), JSON.stringify({ version: "2.3.4" }));

    expect(getVersion(nested)).toBe("2.3.4");
  });

  it("should fall back when the package has no version", () => {
    fs.writeFileSync(path.join(tempDir, "package.json"), JSON.stringify({ name: "x" }));

    expect(getVersion(tempDir)).toBe("0.0.0");
  });
});
