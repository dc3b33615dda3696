/**
 * Folder list resolution
 *
 * Expands an instance's `folders` value into concrete absolute paths.
 *
 * Token forms, processed in order:
 * - `":other"` as the whole value: use instance `other`'s folders
 * - `"/abs/base/+"`: sets the base path for the following tokens
 * - `":name"`: each fragment of substitution list `name`, under the base
 * - `["a", "b"]`: inline fragments, under the base
 * - anything else: a fragment under the base, or itself if absolute
 *
 * Paths may come from a different OS than the one running the check,
 * so separators and absoluteness are handled for both styles.
 */

import { ConfigError } from "../errors.js";
import { own, type FoldersValue, type Settings } from "./document.js";

/** Prefix for alias and substitution tokens */
export const REFERENCE_MARKER = ":";

/** Final path component marking a base path token */
export const BASE_MARKER = "+";

export type ResolvedFolder = {
  /** Final path component, used as the row label */
  name: string;
  path: string;
};

/**
 * Basename that works for both `/` and `\` separated paths
 */
export function pathBasename(filePath: string): string {
  const parts = filePath.replace(/\\/g, "/").replace(/\/+$/, "").split("/");
  return parts[parts.length - 1] ?? "";
}

/**
 * True for POSIX (`/x`), UNC or rooted (`\x`) and drive (`C:\x`) paths
 */
export function isAbsoluteAnyOs(filePath: string): boolean {
  return /^([A-Za-z]:)?[\\/]/.test(filePath);
}

/**
 * Join a fragment to a base, using the separator style of the base
 */
export function joinAnyOs(base: string, fragment: string): string {
  const separator = base.includes("\\") || /^[A-Za-z]:/.test(base) ? "\\" : "/";
  const trimmedBase = base.replace(/[\\/]+$/, "");
  const trimmedFragment = fragment.replace(/^[\\/]+/, "");
  if (trimmedBase === "") {
    return `${separator}${trimmedFragment}`;
  }
  return `${trimmedBase}${separator}${trimmedFragment}`;
}

function isBaseToken(token: string): boolean {
  return pathBasename(token) === BASE_MARKER;
}

function stripBaseMarker(token: string): string {
  return token.replace(/[\\/]*\+[\\/]*$/, "");
}

function isAlias(value: FoldersValue): value is string {
  return typeof value === "string";
}

/**
 * Resolve the folder list of one instance of a set.
 *
 * Alias chains are followed iteratively; revisiting an instance in the
 * current chain fails with `AliasCycle`.
 */
export function resolveFolders(
  settings: Settings,
  setName: string,
  instanceName: string
): ResolvedFolder[] {
  const setConfig = own(settings.set, setName);
  if (!setConfig) {
    throw new ConfigError("UnknownSet", `Unknown set '${setName}'`, { set: setName });
  }

  const chain: string[] = [];
  let current = instanceName;

  for (;;) {
    if (chain.includes(current)) {
      throw new ConfigError(
        "AliasCycle",
        `Alias cycle in '${setName}': ${[...chain, current].join(" -> ")}`,
        { set: setName, chain: [...chain, current] }
      );
    }
    chain.push(current);

    const instance = own(setConfig.instance, current);
    if (!instance) {
      const referrer = chain.length > 1 ? ` (aliased from '${chain[chain.length - 2]}')` : "";
      throw new ConfigError(
        "UnknownInstance",
        `Unknown instance '${current}' in set '${setName}'${referrer}`,
        { set: setName, instance: current }
      );
    }

    const folders = instance.folders;
    if (folders === undefined || folders.length === 0) {
      throw new ConfigError(
        "MissingFolders",
        `No folders for '${setName}/${current}'`,
        { set: setName, instance: current }
      );
    }

    if (isAlias(folders)) {
      if (!folders.startsWith(REFERENCE_MARKER)) {
        // A bare string is a single-token list
        return expandTokens(settings, setName, current, [folders]);
      }
      current = folders.slice(REFERENCE_MARKER.length);
      continue;
    }

    return expandTokens(settings, setName, current, folders);
  }
}

function expandTokens(
  settings: Settings,
  setName: string,
  instanceName: string,
  tokens: ReadonlyArray<string | string[]>
): ResolvedFolder[] {
  const resolved: ResolvedFolder[] = [];
  let base: string | null = null;

  const emit = (fragment: string): void => {
    let folderPath: string;
    if (isAbsoluteAnyOs(fragment)) {
      folderPath = fragment;
    } else if (base !== null) {
      folderPath = joinAnyOs(base, fragment);
    } else {
      throw new ConfigError(
        "RelativePath",
        `Relative path '${fragment}' before any base path in '${setName}/${instanceName}'`,
        { set: setName, instance: instanceName, fragment }
      );
    }
    resolved.push({ name: pathBasename(folderPath), path: folderPath });
  };

  for (const token of tokens) {
    if (Array.isArray(token)) {
      token.forEach(emit);
      continue;
    }

    if (isBaseToken(token)) {
      const stripped = stripBaseMarker(token);
      if (isAbsoluteAnyOs(stripped)) {
        base = stripped;
      } else if (base !== null) {
        base = joinAnyOs(base, stripped);
      } else {
        throw new ConfigError(
          "RelativePath",
          `Relative base path '${token}' in '${setName}/${instanceName}'`,
          { set: setName, instance: instanceName, fragment: token }
        );
      }
      continue;
    }

    if (token.startsWith(REFERENCE_MARKER)) {
      const listName = token.slice(REFERENCE_MARKER.length);
      const fragments = own(settings.sub, listName);
      if (!fragments) {
        throw new ConfigError(
          "UnknownSubstitution",
          `Unknown substitution list '${listName}' in '${setName}/${instanceName}'`,
          { set: setName, instance: instanceName, substitution: listName }
        );
      }
      fragments.forEach(emit);
      continue;
    }

    emit(token);
  }

  if (resolved.length === 0) {
    throw new ConfigError(
      "MissingFolders",
      `Folders for '${setName}/${instanceName}' resolve to nothing`,
      { set: setName, instance: instanceName }
    );
  }

  return resolved;
}

/**
 * Resolve every instance of a set. Stops at the first failing instance.
 */
export function resolveSet(settings: Settings, setName: string): Map<string, ResolvedFolder[]> {
  const setConfig = own(settings.set, setName);
  if (!setConfig) {
    throw new ConfigError("UnknownSet", `Unknown set '${setName}'`, { set: setName });
  }

  const result = new Map<string, ResolvedFolder[]>();
  for (const instanceName of Object.keys(setConfig.instance)) {
    result.set(instanceName, resolveFolders(settings, setName, instanceName));
  }
  return result;
}
