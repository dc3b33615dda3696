/**
 * Version management for the CLI
 *
 * Reads the version from package.json at runtime for consistency.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PackageJsonSchema = z.object({ version: z.string() }).passthrough();

/**
 * Get the package version from package.json
 *
 * Works from both src/cli/ and dist/cli/, which sit two levels below
 * the package root.
 */
function getPackageVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const packagePath = join(here, "../../package.json");

  let content: string;
  try {
    content = readFileSync(packagePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return "0.0.0";
    }
    throw error;
  }
  const parsed = PackageJsonSchema.safeParse(JSON.parse(content));
  return parsed.success ? parsed.data.version : "0.0.0";
}

export const VERSION = getPackageVersion();
