/**
 * checkstate [set] [instance] - check this machine's copy of a set and
 * compare it with what the other instances last recorded
 */

import { ExitCodes, TargetError, TransportError, type ExitCode } from "../../errors.js";
import type { FolderState } from "../../core/document.js";
import { resolveFolders } from "../../core/resolver.js";
import { reconcile, type SetReport } from "../../core/reconciler.js";
import {
  GitFolderInspector,
  inspectFolders,
  type DebugFn,
  type FolderInspector,
} from "../../core/inspector.js";
import type { StateStore } from "../../core/store.js";
import {
  defaultRepoLocator,
  isSeen,
  loadLocalConfig,
  markSeen,
  saveLocalConfig,
  type LocalConfig,
} from "../config.js";
import { renderList, renderReport, type FormatOptions } from "../format.js";
import { GitTransport } from "../sync/git-transport.js";
import { fetchStore, storeResults, type SharedStorageTransport } from "../sync/transport.js";
import { guessTarget } from "../target.js";
import { createDebug, exitCodeOf, exitWithError, note, warn } from "../shared.js";

export type CheckOptions = {
  repo?: string;
  /** false when --no-store was given */
  store?: boolean;
  list?: boolean;
  showStored?: boolean;
  json?: boolean;
  verbose?: boolean;
};

export type Output = {
  log(line: string): void;
  error(line: string): void;
};

export type CheckDeps = {
  transport: SharedStorageTransport;
  inspector: FolderInspector;
  localConfig: LocalConfig;
  cwd: string;
  now?: () => Date;
  output?: Output;
  format?: FormatOptions;
  debug?: DebugFn;
};

export type CheckOutcome = {
  exitCode: ExitCode;
  reports: SetReport[];
  /** Local config changed (new target seen) and should be saved */
  configChanged: boolean;
};

/**
 * Run one check. Fetches the shared document, then lists, shows stored
 * results, or inspects the local folders and reconciles.
 *
 * Config, store and fetch failures are thrown. A failed store after a
 * successful check is reported and turned into a non-zero exit code so
 * the computed report is never lost.
 */
export async function runCheck(
  target: { set?: string; instance?: string },
  options: CheckOptions,
  deps: CheckDeps
): Promise<CheckOutcome> {
  const output = deps.output ?? console;
  // Keep stdout clean for --json
  const progress = options.json ? output.error.bind(output) : output.log.bind(output);
  const { transport } = deps;

  try {
    progress("[fetching settings from repo.]");
    const store = await fetchStore(transport);

    if (options.list) {
      runList(store, output);
      return { exitCode: ExitCodes.Success, reports: [], configChanged: false };
    }

    if (options.showStored) {
      const reports = runShowStored(store, target.set, {
        json: options.json,
        format: deps.format,
        output,
      });
      return { exitCode: ExitCodes.Success, reports, configChanged: false };
    }

    return await checkLocal(store, target, options, deps, output, progress);
  } finally {
    await transport.dispose();
  }
}

/**
 * Print the configured sets and instances (--list)
 */
export function runList(store: StateStore, output: Output = console): void {
  output.log(renderList(store));
}

/**
 * Render what is stored for one set, or every stored set, without
 * inspecting anything (--show-stored)
 */
export function runShowStored(
  store: StateStore,
  setName: string | undefined,
  options: { json?: boolean; format?: FormatOptions; output?: Output } = {}
): SetReport[] {
  const output = options.output ?? console;
  const sets = setName === undefined ? store.storedSets() : [setName];
  const reports: SetReport[] = [];

  for (const name of sets) {
    const state = store.getSetState(name);
    if (state.size === 0) {
      note(`no stored results for '${name}'`, output);
      continue;
    }
    reports.push(reconcile(name, state));
  }

  if (options.json) {
    output.log(JSON.stringify(reports, null, 2));
  } else {
    for (const report of reports) {
      output.log(`\n${report.set}`);
      output.log(renderReport(report, options.format));
    }
  }
  return reports;
}

async function checkLocal(
  store: StateStore,
  target: { set?: string; instance?: string },
  options: CheckOptions,
  deps: CheckDeps,
  output: Output,
  progress: (line: string) => void
): Promise<CheckOutcome> {
  const { localConfig } = deps;
  let configChanged = false;

  let setName: string;
  let instance: string;
  if (target.set !== undefined && target.instance !== undefined) {
    setName = target.set;
    instance = target.instance;
  } else {
    const guessed = guessTarget({
      settings: store.getSettings(),
      cwd: deps.cwd,
      seen: localConfig.seen,
      set: target.set,
      debug: deps.debug,
    });
    setName = guessed.set;
    instance = guessed.instance;
    if (!isSeen(localConfig, setName, instance)) {
      progress(`Guessing project / instance '${setName}' / '${instance}' from folder`);
    }
  }

  const folders = resolveFolders(store.getSettings(), setName, instance);
  if (markSeen(localConfig, setName, instance)) {
    configChanged = true;
  }

  const inspections = await inspectFolders(deps.inspector, folders);
  const states: FolderState[] = [];
  for (const { result } of inspections) {
    if (result.ok) {
      states.push(result.value);
    } else {
      warn(result.error.message, output);
    }
  }
  progress(`${setName}/${instance}: ${states.map((state) => state.name).join(", ")}`);

  const now = deps.now?.() ?? new Date();
  store.recordLocal(setName, instance, states, now);
  const report = reconcile(setName, store.getSetState(setName), instance);

  output.log(options.json ? JSON.stringify(report, null, 2) : renderReport(report, deps.format));

  let exitCode: ExitCode = ExitCodes.Success;
  if (options.store === false) {
    progress("[NOT storing results to repo.]");
  } else {
    progress("[storing results in repo.]");
    try {
      await storeResults(deps.transport, store);
    } catch (error) {
      if (!(error instanceof TransportError)) throw error;
      output.error(`Error: storing results failed: ${error.message}`);
      exitCode = error.exitCode;
    }
  }

  return { exitCode, reports: [report], configChanged };
}

/**
 * CLI action for the default command
 */
export async function check(
  set: string | undefined,
  instance: string | undefined,
  options: CheckOptions
): Promise<void> {
  const debug = createDebug(options.verbose);

  try {
    const localConfig = await loadLocalConfig();
    const repo = options.repo ?? defaultRepoLocator(localConfig);
    const repoChanged = localConfig.repo !== repo;
    localConfig.repo = repo;

    const outcome = await runCheck({ set, instance }, options, {
      transport: new GitTransport(repo, { timeoutMs: localConfig.timeoutMs, debug }),
      inspector: new GitFolderInspector({
        ignore: localConfig.ignore,
        timeoutMs: localConfig.timeoutMs,
        debug,
      }),
      localConfig,
      cwd: process.cwd(),
      debug,
    });

    if (outcome.configChanged || (repoChanged && outcome.exitCode === ExitCodes.Success)) {
      note("Updating local config.");
      await saveLocalConfig(localConfig);
    }
    process.exitCode = outcome.exitCode;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    let suggestion: string | undefined;
    if (error instanceof TargetError && error.choices.length > 0) {
      suggestion = [
        "run one of the following to set for this machine",
        ...error.choices.map(
          ([s, i]) => `  checkstate${options.repo ? ` --repo ${options.repo}` : ""} ${s} ${i}`
        ),
      ].join("\n");
    } else if (error instanceof TargetError) {
      suggestion = "give the set and instance explicitly: checkstate <set> <instance>";
    }
    exitWithError(message, suggestion, exitCodeOf(error));
  }
}
