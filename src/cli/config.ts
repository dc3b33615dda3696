/**
 * Local (per-machine) configuration
 *
 * Stored at $CHECKSTATE_HOME/config.json, default ~/.checkstate/config.json.
 * Not to be confused with the settings document kept in the shared
 * repository: this file only remembers things about this machine.
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { z } from "zod";

import { StoreError } from "../errors.js";

const CONFIG_FILENAME = "config.json";
const CONFIG_DIR = ".checkstate";

export const LocalConfigSchema = z
  .object({
    /** Last used repository locator */
    repo: z.string().min(1).optional(),
    /** [set, instance] pairs checked from this machine */
    seen: z.array(z.tuple([z.string(), z.string()])).default([]),
    /** Globs skipped when computing file statistics */
    ignore: z.array(z.string()).optional(),
    /** Timeout for each git subprocess, in ms */
    timeoutMs: z.number().int().positive().optional(),
  })
  .passthrough();

export type LocalConfig = z.infer<typeof LocalConfigSchema>;

/**
 * Get the local config directory
 */
export function getConfigDir(): string {
  const envDir = process.env.CHECKSTATE_HOME;
  if (envDir) {
    return path.resolve(envDir);
  }
  return path.join(os.homedir(), CONFIG_DIR);
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), CONFIG_FILENAME);
}

/**
 * Load the local config. A missing file gives the defaults; an
 * unreadable or invalid one is a StoreError.
 */
export async function loadLocalConfig(): Promise<LocalConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { seen: [] };
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new StoreError(
      "MalformedDocument",
      `Invalid JSON in ${formatPath(configPath)}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = LocalConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new StoreError("MalformedDocument", `Malformed ${formatPath(configPath)}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Save the local config
 */
export async function saveLocalConfig(config: LocalConfig): Promise<void> {
  const configPath = getConfigPath();
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify(config, null, 4), "utf-8");
}

/**
 * Repository locator used when --repo is not given
 */
export function defaultRepoLocator(config: LocalConfig): string {
  return config.repo ?? `git@gitlab.com:${os.userInfo().username}/check_state_info.git`;
}

/**
 * Record a checked target in `seen`. Returns true when it was new.
 */
export function markSeen(config: LocalConfig, setName: string, instance: string): boolean {
  if (isSeen(config, setName, instance)) {
    return false;
  }
  config.seen.push([setName, instance]);
  return true;
}

export function isSeen(config: LocalConfig, setName: string, instance: string): boolean {
  return config.seen.some(([s, i]) => s === setName && i === instance);
}

/**
 * Format a path for display (use ~ for home directory)
 */
export function formatPath(filePath: string): string {
  const home = os.homedir();
  if (filePath.startsWith(home)) {
    return "~" + filePath.slice(home.length);
  }
  return filePath;
}
