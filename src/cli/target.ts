/**
 * Work out which set/instance a run is checking when the instance is
 * not given on the command line.
 *
 * An instance matches when one of its resolved folders is the current
 * directory. Targets this machine has checked before win over new ones.
 * Both sides are compared as physical paths, so a folder configured
 * through a symlink matches the directory it points to.
 */

import fs from "node:fs";
import path from "node:path";

import { ConfigError, TargetError, logError } from "../errors.js";
import { own, type Settings } from "../core/document.js";
import { resolveFolders } from "../core/resolver.js";
import type { DebugFn } from "../core/inspector.js";

export type Target = {
  set: string;
  instance: string;
  /** True when the target was guessed rather than given */
  guessed: boolean;
};

export type GuessOptions = {
  settings: Settings;
  cwd: string;
  seen: Array<[string, string]>;
  /** Restrict the guess to one set */
  set?: string;
  debug?: DebugFn;
};

/**
 * Symlink-free absolute path; the lexical one when the path does not
 * exist on this machine
 */
export function physicalPath(filePath: string, debug?: DebugFn): string {
  const resolved = path.resolve(filePath);
  try {
    return fs.realpathSync.native(resolved);
  } catch (error) {
    logError(`realpath ${resolved}`, error, debug);
    return resolved;
  }
}

export function guessTarget(options: GuessOptions): Target {
  const { settings, set, debug } = options;
  if (set !== undefined && !own(settings.set, set)) {
    throw new ConfigError("UnknownSet", `Unknown set '${set}'`, { set });
  }

  const cwd = physicalPath(options.cwd, debug);
  const choices: Array<[string, string]> = [];

  for (const setName of Object.keys(settings.set)) {
    if (set !== undefined && setName !== set) continue;

    for (const instance of Object.keys(settings.set[setName].instance)) {
      let folders: string[];
      try {
        folders = resolveFolders(settings, setName, instance).map((folder) =>
          physicalPath(folder.path, debug)
        );
      } catch (error) {
        if (!(error instanceof ConfigError)) throw error;
        debug?.(`skipping ${setName}/${instance} while guessing: ${error.message}`);
        continue;
      }

      if (!folders.includes(cwd)) continue;

      if (options.seen.some(([s, i]) => s === setName && i === instance)) {
        return { set: setName, instance, guessed: true };
      }
      choices.push([setName, instance]);
    }
  }

  if (choices.length === 1) {
    const [setName, instance] = choices[0];
    return { set: setName, instance, guessed: true };
  }
  if (choices.length > 1) {
    throw new TargetError("Ambiguous", "Path exists in multiple instances", choices);
  }
  throw new TargetError("NotGuessable", "Can't guess project / instance from current folder");
}
