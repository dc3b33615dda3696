/**
 * Folder inspection
 *
 * Turns a version-controlled folder into a `FolderState`: file
 * statistics from a directory walk, commit/branch/modification facts
 * from git, and whether the branch matches its upstream.
 *
 * An unreachable remote is not a failure: the state is still returned,
 * with `remoteOk: false` and `remoteStatus: "unknown"`.
 */

import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";
import { execFile } from "node:child_process";
import { minimatch } from "minimatch";

import { InspectError, logError } from "../errors.js";
import { err, ok, type Result } from "./result.js";
import type { FolderState, RemoteStatus } from "./document.js";
import { pathBasename, type ResolvedFolder } from "./resolver.js";

export type DebugFn = (message: string, data?: Record<string, unknown>) => void;

export type InspectResult = Result<FolderState, InspectError>;

/**
 * Produces the state of one folder
 */
export interface FolderInspector {
  inspect(folderPath: string): Promise<InspectResult>;
}

// =============================================================================
// Git command runner
// =============================================================================

export type GitOutput = {
  /** 0 on success, -1 when git could not be started */
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type GitRunner = (
  args: string[],
  options: { cwd: string; timeoutMs: number }
) => Promise<GitOutput>;

/**
 * Run `git -C <cwd> ...args`. Never rejects; failures are reported
 * through the exit code.
 */
export const runGit: GitRunner = (args, { cwd, timeoutMs }) =>
  new Promise((resolve) => {
    execFile(
      "git",
      ["-C", cwd, ...args],
      { timeout: timeoutMs, maxBuffer: 16 * 1024 * 1024, encoding: "utf8", windowsHide: true },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        resolve({
          exitCode: typeof error.code === "number" ? error.code : -1,
          stdout,
          stderr: stderr || error.message,
          timedOut: error.killed === true,
        });
      }
    );
  });

// =============================================================================
// File statistics
// =============================================================================

export type FileStats = {
  fileCount: number;
  bytes: number;
  /** Modification time of the newest file, epoch ms; null when empty */
  latestMtimeMs: number | null;
  latestFile: string | null;
};

const SEPARATOR = Buffer.from(path.sep);

/**
 * Walk a directory tree and total its regular files.
 * `.git` is always skipped; `ignore` globs match paths relative to `dir`.
 *
 * Names are read as bytes so files whose names are not valid UTF-8 are
 * still counted. Entries that vanish or cannot be read are logged and
 * skipped.
 */
export async function collectFileStats(
  dir: string,
  ignore: string[] = [],
  debug?: DebugFn
): Promise<FileStats> {
  const stats: FileStats = { fileCount: 0, bytes: 0, latestMtimeMs: null, latestFile: null };

  const isIgnored = (relPath: string): boolean =>
    ignore.some((pattern) => minimatch(relPath, pattern, { dot: true }));

  async function walkDir(currentDir: Buffer, relativePath: string): Promise<void> {
    let names: Buffer[];
    try {
      names = await fs.readdir(currentDir, { encoding: "buffer" });
    } catch (error) {
      logError(`readdir ${currentDir.toString()}`, error, debug);
      return;
    }
    names.sort(Buffer.compare);

    for (const rawName of names) {
      const name = rawName.toString();
      if (name === ".git") continue;

      const entryPath = Buffer.concat([currentDir, SEPARATOR, rawName]);
      const relPath = relativePath ? `${relativePath}/${name}` : name;
      if (isIgnored(relPath)) continue;

      let stat: Stats;
      try {
        stat = await fs.lstat(entryPath);
      } catch (error) {
        logError(`stat ${entryPath.toString()}`, error, debug);
        continue;
      }

      if (stat.isDirectory()) {
        await walkDir(entryPath, relPath);
      } else if (stat.isFile()) {
        stats.fileCount += 1;
        stats.bytes += stat.size;
        if (stats.latestMtimeMs === null || stat.mtimeMs > stats.latestMtimeMs) {
          stats.latestMtimeMs = stat.mtimeMs;
          stats.latestFile = entryPath.toString();
        }
      }
    }
  }

  await walkDir(Buffer.from(dir.replace(/[\\/]+$/, "") || dir), "");
  return stats;
}

// =============================================================================
// Git inspector
// =============================================================================

export type GitInspectorOptions = {
  /** Globs skipped when computing file statistics */
  ignore?: string[];
  /** Timeout for each git subprocess */
  timeoutMs?: number;
  runGit?: GitRunner;
  debug?: DebugFn;
};

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Compare `git ls-remote` output with the local branch head
 */
export function compareRemoteHeads(
  lsRemoteOutput: string,
  branch: string | null,
  commit: string | null
): RemoteStatus {
  if (!branch || branch === "HEAD" || !commit) {
    return "unknown";
  }

  const ref = `refs/heads/${branch}`;
  const heads = lsRemoteOutput
    .split("\n")
    .map((line) => line.trim().split(/\s+/))
    .filter((fields) => fields.length === 2 && fields[1] === ref)
    .map((fields) => fields[0]);

  if (heads.length === 0) {
    // Branch has never been pushed
    return "differs";
  }
  return heads.every((head) => head === commit) ? "in-sync" : "differs";
}

export class GitFolderInspector implements FolderInspector {
  private readonly ignore: string[];
  private readonly timeoutMs: number;
  private readonly git: GitRunner;
  private readonly debug?: DebugFn;

  constructor(options: GitInspectorOptions = {}) {
    this.ignore = options.ignore ?? [];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.git = options.runGit ?? runGit;
    this.debug = options.debug;
  }

  async inspect(folderPath: string): Promise<InspectResult> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(folderPath)).isDirectory();
    } catch (error) {
      logError(`stat ${folderPath}`, error, this.debug);
      return err(new InspectError("PathNotFound", folderPath, `No path '${folderPath}'`));
    }
    if (!isDirectory) {
      return err(
        new InspectError("NotAVcsFolder", folderPath, `Path '${folderPath}' is not a directory`)
      );
    }

    const inside = await this.run(folderPath, ["rev-parse", "--is-inside-work-tree"]);
    if (inside !== "true") {
      return err(
        new InspectError(
          "NotAVcsFolder",
          folderPath,
          `Path '${folderPath}' is not a git working copy`
        )
      );
    }

    const commit = await this.run(folderPath, ["rev-parse", "HEAD"]);
    const branch = await this.run(folderPath, ["rev-parse", "--abbrev-ref", "HEAD"]);
    const commitSeconds = commit
      ? await this.run(folderPath, ["log", "-1", "--format=%ct", commit])
      : null;
    const status = await this.run(folderPath, ["status", "--porcelain", "--untracked-files=no"]);
    const remoteStatus = await this.remoteStatus(folderPath, branch, commit);
    const files = await collectFileStats(folderPath, this.ignore, this.debug);

    const commitEpoch = commitSeconds ? Number.parseInt(commitSeconds, 10) : Number.NaN;

    return ok({
      name: pathBasename(folderPath),
      path: folderPath,
      remoteOk: remoteStatus === "in-sync",
      remoteStatus,
      hasMods: status !== null && status.length > 0,
      latestModified:
        files.latestMtimeMs === null ? null : new Date(files.latestMtimeMs).toISOString(),
      latestFile: files.latestFile,
      fileCount: files.fileCount,
      bytes: files.bytes,
      commit: commit || null,
      branch: branch || null,
      commitTime: Number.isNaN(commitEpoch) ? null : new Date(commitEpoch * 1000).toISOString(),
    });
  }

  private async remoteStatus(
    folderPath: string,
    branch: string | null,
    commit: string | null
  ): Promise<RemoteStatus> {
    const output = await this.git(["ls-remote"], { cwd: folderPath, timeoutMs: this.timeoutMs });
    if (output.exitCode !== 0) {
      const reason = output.timedOut ? "timed out" : output.stderr.trim();
      const unreachable = new InspectError(
        "RemoteUnreachable",
        folderPath,
        `Remote unreachable for '${folderPath}': ${reason}`
      );
      logError("ls-remote", unreachable, this.debug);
      return "unknown";
    }
    return compareRemoteHeads(output.stdout, branch, commit);
  }

  /**
   * Trimmed stdout, or null when the command failed
   */
  private async run(folderPath: string, args: string[]): Promise<string | null> {
    const output = await this.git(args, { cwd: folderPath, timeoutMs: this.timeoutMs });
    if (output.exitCode !== 0) {
      this.debug?.(`git ${args.join(" ")} failed`, {
        path: folderPath,
        exitCode: output.exitCode,
        stderr: output.stderr.trim(),
      });
      return null;
    }
    return output.stdout.trim();
  }
}

// =============================================================================
// Batch inspection
// =============================================================================

export type FolderInspection = {
  folder: ResolvedFolder;
  result: InspectResult;
};

/**
 * Run async work with a concurrency limit, results in input order
 */
export async function mapConcurrent<T, U>(
  items: T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<U[]> {
  const results: U[] = new Array(items.length);
  let currentIndex = 0;

  async function worker(): Promise<void> {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      results[index] = await fn(items[index], index);
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () =>
    worker()
  );
  await Promise.all(workers);
  return results;
}

/**
 * Inspect folders in parallel. The returned list keeps the order of
 * `folders` whatever order the inspections finish in.
 */
export async function inspectFolders(
  inspector: FolderInspector,
  folders: ResolvedFolder[],
  options: {
    concurrency?: number;
    onResult?: (inspection: FolderInspection) => void;
  } = {}
): Promise<FolderInspection[]> {
  return mapConcurrent(
    folders,
    async (folder) => {
      const result = await inspector.inspect(folder.path);
      const inspection = { folder, result };
      options.onResult?.(inspection);
      return inspection;
    },
    options.concurrency ?? 4
  );
}
