/**
 * Cross-instance reconciliation
 *
 * Builds the comparison model for one set: a folders x instances matrix
 * of recorded states, which instance holds the newest modification of
 * each folder, commit disagreements between instances that each claim
 * to match upstream, and the commands that would fix the local copy.
 *
 * Nothing is changed on disk; this only detects and suggests.
 */

import type { FolderState, RemoteStatus, SetState } from "./document.js";

export type InstanceColumn = {
  name: string;
  /** When the instance's record was produced (ISO) */
  updated: string;
  local: boolean;
};

export type FolderCell = {
  instance: string;
  state: FolderState;
  /** Holds the most recent modification of this folder */
  latest: boolean;
  /** Takes part in a mixed-commit disagreement */
  mixedCommit: boolean;
};

export type FolderRow = {
  name: string;
  /** Instances that recorded this folder, local instance last */
  cells: FolderCell[];
  /** Instances holding the most recent modification */
  latest: string[];
  mixedCommits: boolean;
};

/**
 * An instance that claims to match upstream but is not at the newest
 * commit among the instances making the same claim
 */
export type CommitMismatch = {
  folder: string;
  instance: string;
  commit: string;
  newestCommit: string;
  newestInstance: string;
  local: boolean;
};

export type ReportWarning = {
  kind: "mixed-commits" | "remote-unknown";
  folder: string;
  instances: string[];
  message: string;
};

export type RemedyKind = "pull" | "pull-or-push" | "commit-and-push";

export type Remedy = {
  kind: RemedyKind;
  folder: string;
  /** Folder path on the local instance */
  path: string;
  command: string;
};

export type SetReport = {
  set: string;
  localInstance: string | null;
  instances: InstanceColumn[];
  folders: FolderRow[];
  mismatches: CommitMismatch[];
  warnings: ReportWarning[];
  remedies: Remedy[];
};

/**
 * Remote status of a recorded folder. Records written before
 * `remoteStatus` existed only carry `remoteOk`.
 */
export function remoteStatusOf(state: FolderState): RemoteStatus {
  return state.remoteStatus ?? (state.remoteOk ? "in-sync" : "differs");
}

function timeOf(iso: string | null | undefined): number {
  if (!iso) return Number.NEGATIVE_INFINITY;
  const parsed = Date.parse(iso);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

/**
 * Instance names in display order: insertion order, local instance last
 */
export function orderInstances(setState: SetState, localInstance?: string): string[] {
  const names = [...setState.keys()];
  if (!localInstance || !setState.has(localInstance)) {
    return names;
  }
  return [...names.filter((name) => name !== localInstance), localInstance];
}

function orderFolders(setState: SetState, instanceOrder: string[], localInstance?: string): string[] {
  const seen = new Set<string>();
  const order: string[] = [];
  const add = (name: string): void => {
    if (!seen.has(name)) {
      seen.add(name);
      order.push(name);
    }
  };

  const local = localInstance ? setState.get(localInstance) : undefined;
  local?.folders.forEach((folder) => add(folder.name));
  for (const instance of instanceOrder) {
    setState.get(instance)?.folders.forEach((folder) => add(folder.name));
  }
  return order;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function remedyCommand(kind: RemedyKind, folderPath: string): string {
  const quoted = shellQuote(folderPath);
  switch (kind) {
    case "pull":
      return `git -C ${quoted} pull`;
    case "pull-or-push":
      return `git -C ${quoted} pull  # or maybe push`;
    case "commit-and-push":
      return `git -C ${quoted} commit -a && git -C ${quoted} push`;
  }
}

/**
 * Among instances claiming to match upstream, find the newest commit:
 * latest commit time, then latest record.
 */
function newestClaim(
  cells: FolderCell[],
  updatedOf: (instance: string) => number
): FolderCell | undefined {
  let newest: FolderCell | undefined;
  for (const cell of cells) {
    if (!newest) {
      newest = cell;
      continue;
    }
    const commitDelta = timeOf(cell.state.commitTime) - timeOf(newest.state.commitTime);
    const sameTime = commitDelta === 0 || Number.isNaN(commitDelta);
    if (commitDelta > 0 || (sameTime && updatedOf(cell.instance) > updatedOf(newest.instance))) {
      newest = cell;
    }
  }
  return newest;
}

/**
 * Reconcile the recorded states of one set.
 *
 * @param localInstance - the instance checked in this run; omit when
 *   rendering stored results only
 */
export function reconcile(setName: string, setState: SetState, localInstance?: string): SetReport {
  const instanceOrder = orderInstances(setState, localInstance);
  const local = localInstance && setState.has(localInstance) ? localInstance : null;

  const instances: InstanceColumn[] = instanceOrder.map((name) => ({
    name,
    updated: setState.get(name)?.updated ?? "",
    local: name === local,
  }));
  const updatedOf = (name: string): number => timeOf(setState.get(name)?.updated);

  const rows: FolderRow[] = [];
  const mismatches: CommitMismatch[] = [];
  const warnings: ReportWarning[] = [];
  const remedies: Remedy[] = [];

  for (const folderName of orderFolders(setState, instanceOrder, localInstance)) {
    const cells: FolderCell[] = [];
    for (const instance of instanceOrder) {
      const state = setState.get(instance)?.folders.find((folder) => folder.name === folderName);
      if (state) {
        cells.push({ instance, state, latest: false, mixedCommit: false });
      }
    }

    // Newest modification
    const latestTime = Math.max(...cells.map((cell) => timeOf(cell.state.latestModified)));
    const latest: string[] = [];
    if (Number.isFinite(latestTime)) {
      for (const cell of cells) {
        if (timeOf(cell.state.latestModified) === latestTime) {
          cell.latest = true;
          latest.push(cell.instance);
        }
      }
    }

    // Commit agreement among instances that believe they match upstream
    const claims = cells.filter((cell) => cell.state.remoteOk && Boolean(cell.state.commit));
    const commits = new Set(claims.map((cell) => cell.state.commit));
    const mixedCommits = commits.size > 1;

    if (mixedCommits) {
      claims.forEach((cell) => {
        cell.mixedCommit = true;
      });
      warnings.push({
        kind: "mixed-commits",
        folder: folderName,
        instances: claims.map((cell) => cell.instance),
        message: `mixed commits for '${folderName}': ${claims
          .map((cell) => `${cell.instance}@${(cell.state.commit ?? "").slice(0, 7)}`)
          .join(", ")}`,
      });

      const newest = newestClaim(claims, updatedOf);
      if (newest) {
        const newestCommit = newest.state.commit ?? "";
        for (const cell of claims) {
          const commit = cell.state.commit ?? "";
          if (commit === newestCommit) continue;
          mismatches.push({
            folder: folderName,
            instance: cell.instance,
            commit,
            newestCommit,
            newestInstance: newest.instance,
            local: cell.instance === local,
          });
        }
      }
    }

    rows.push({ name: folderName, cells, latest, mixedCommits });

    const localCell = cells.find((cell) => cell.instance === local);
    if (!localCell) continue;

    const localPath = localCell.state.path;
    const status = remoteStatusOf(localCell.state);

    if (status === "unknown") {
      warnings.push({
        kind: "remote-unknown",
        folder: folderName,
        instances: [localCell.instance],
        message: `remote state of '${folderName}' unknown (offline?)`,
      });
    }

    const localBehind = mismatches.some(
      (mismatch) => mismatch.folder === folderName && mismatch.local
    );
    if (localBehind) {
      remedies.push({
        kind: "pull",
        folder: folderName,
        path: localPath,
        command: remedyCommand("pull", localPath),
      });
    }
    if (status === "differs") {
      remedies.push({
        kind: "pull-or-push",
        folder: folderName,
        path: localPath,
        command: remedyCommand("pull-or-push", localPath),
      });
    }
    if (localCell.state.hasMods) {
      remedies.push({
        kind: "commit-and-push",
        folder: folderName,
        path: localPath,
        command: remedyCommand("commit-and-push", localPath),
      });
    }
  }

  return {
    set: setName,
    localInstance: local,
    instances,
    folders: rows,
    mismatches,
    warnings,
    remedies,
  };
}
