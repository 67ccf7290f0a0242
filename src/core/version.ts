/**
 * Version information for the CLI.
 *
 * This is read from package.json at runtime to ensure consistency.
 */

import { readFile } from "node:fs/promises";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = dirname(fileURLToPath(import.meta.url));

let cachedVersion: string | null = null;

/**
 * Try to read the version field of a package.json at a given path.
 */
export async function tryReadPackageJson(path: string): Promise<string | null> {
  let pkg: unknown;
  try {
    const content = await readFile(path, "utf-8");
    pkg = JSON.parse(content);
  } catch {
    return null;
  }

  if (
    typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  return null;
}

/**
 * Get the current version from package.json.
 * Result is cached for subsequent calls.
 *
 * Compiled: dist/core/version.js -> ../../package.json
 * Source:   src/core/version.ts  -> ../../package.json
 * Installed next to package.json -> ../package.json
 */
export async function getVersion(): Promise<string> {
  if (cachedVersion) {
    return cachedVersion;
  }

  const possiblePaths = [
    join(moduleDir, "..", "..", "package.json"),
    join(moduleDir, "..", "package.json"),
  ];

  for (const path of possiblePaths) {
    const version = await tryReadPackageJson(path);
    if (version) {
      cachedVersion = version;
      return version;
    }
  }

  return "unknown";
}
