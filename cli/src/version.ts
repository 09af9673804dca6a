/**
 * Version utilities
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function readVersion(packageJsonPath: string): string | undefined {
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return undefined;
}

/**
 * Get the CLI version from the nearest package.json above this module
 */
export function getVersion(startDir: string = __dirname): string {
  let dir = startDir;
  for (;;) {
    const candidate = path.join(dir, "package.json");
    if (fs.existsSync(candidate)) {
      return readVersion(candidate) ?? "0.0.0";
    }
    const parent = path.dirname(dir);
    if (parent === dir) return "0.0.0";
    dir = parent;
  }
}

/**
 * The current CLI version
 */
export const VERSION = getVersion();
