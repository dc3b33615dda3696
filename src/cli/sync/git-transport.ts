/**
 * Git-backed shared storage
 *
 * fetch clones the repository into a temporary directory and reads the
 * two documents; store writes the results document, commits and pushes.
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

import { TransportError, logError, type TransportErrorKind } from "../../errors.js";
import { runGit, type DebugFn, type GitOutput, type GitRunner } from "../../core/inspector.js";
import type { FetchedDocument, SharedStorageTransport } from "./transport.js";

export const SETTINGS_FILE = "check_state_settings.json";
export const RESULTS_FILE = "check_state_info.json";

const DEFAULT_TIMEOUT_MS = 60_000;

const AUTH_PATTERN =
  /permission denied|authentication failed|could not read username|publickey|access denied|403/i;
const NOT_FOUND_PATTERN = /not found|does not exist|does not appear to be a git repository/i;

/**
 * Map a failed git command to a transport error kind
 */
export function classifyGitFailure(output: GitOutput): TransportErrorKind {
  if (output.timedOut) {
    return "NetworkFailure";
  }
  if (AUTH_PATTERN.test(output.stderr)) {
    return "AuthFailure";
  }
  if (NOT_FOUND_PATTERN.test(output.stderr)) {
    return "NotFound";
  }
  return "NetworkFailure";
}

export type GitTransportOptions = {
  timeoutMs?: number;
  runGit?: GitRunner;
  /** Parent for the temporary checkout, default os.tmpdir() */
  tmpRoot?: string;
  debug?: DebugFn;
};

export class GitTransport implements SharedStorageTransport {
  readonly locator: string;
  private readonly timeoutMs: number;
  private readonly git: GitRunner;
  private readonly tmpRoot: string;
  private readonly debug?: DebugFn;
  private workDir: string | null = null;

  constructor(locator: string, options: GitTransportOptions = {}) {
    this.locator = locator;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.git = options.runGit ?? runGit;
    this.tmpRoot = options.tmpRoot ?? os.tmpdir();
    this.debug = options.debug;
  }

  async fetch(): Promise<FetchedDocument> {
    const workDir = await fs.mkdtemp(path.join(this.tmpRoot, "checkstate-"));
    this.workDir = workDir;
    this.debug?.("cloning settings repository", { locator: this.locator, workDir });

    await this.mustRun(workDir, ["clone", "--quiet", this.locator, "."], "clone");

    const settings = await readOptional(path.join(workDir, SETTINGS_FILE));
    if (settings === null) {
      throw new TransportError(
        "NotFound",
        `${SETTINGS_FILE} not found in ${this.locator}`,
        { locator: this.locator }
      );
    }
    const results = await readOptional(path.join(workDir, RESULTS_FILE));

    return { settings, results };
  }

  async store(results: string): Promise<void> {
    const workDir = this.workDir;
    if (!workDir) {
      throw new Error("GitTransport.store() called before fetch()");
    }

    await fs.writeFile(path.join(workDir, RESULTS_FILE), results, "utf-8");
    await this.mustRun(workDir, ["add", RESULTS_FILE], "add");

    const commit = await this.git(["commit", "--quiet", "-m", "updated"], {
      cwd: workDir,
      timeoutMs: this.timeoutMs,
    });
    if (commit.exitCode !== 0) {
      if (/nothing to commit|nothing added/i.test(commit.stdout + commit.stderr)) {
        this.debug?.("results unchanged, nothing to commit");
        return;
      }
      throw this.failure("commit", commit);
    }

    await this.mustRun(workDir, ["push", "--quiet"], "push");
  }

  async dispose(): Promise<void> {
    const workDir = this.workDir;
    this.workDir = null;
    if (workDir) {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  private async mustRun(cwd: string, args: string[], action: string): Promise<void> {
    const output = await this.git(args, { cwd, timeoutMs: this.timeoutMs });
    if (output.exitCode !== 0) {
      throw this.failure(action, output);
    }
  }

  private failure(action: string, output: GitOutput): TransportError {
    const kind = classifyGitFailure(output);
    const detail = output.timedOut ? "timed out" : output.stderr.trim();
    const error = new TransportError(kind, `git ${action} failed for ${this.locator}: ${detail}`, {
      locator: this.locator,
      action,
    });
    logError(`git ${action}`, error, this.debug);
    return error;
  }
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}
