/**
 * Text rendering of reports and listings
 */

import type { StateStore } from "../core/store.js";
import { resolveSet } from "../core/resolver.js";
import { ConfigError } from "../errors.js";
import { remoteStatusOf, type FolderCell, type SetReport } from "../core/reconciler.js";

export type FormatOptions = {
  /** Render times in UTC instead of the local time zone */
  utc?: boolean;
};

const UNITS = ["", "Ki", "Mi", "Gi", "Ti", "Pi", "Ei", "Zi"];

/**
 * Human readable size, e.g. `1.5KiB`
 */
export function formatSize(bytes: number): string {
  let num = bytes;
  for (const unit of UNITS) {
    if (Math.abs(num) < 1024) {
      return `${num.toFixed(1)}${unit}B`;
    }
    num /= 1024;
  }
  return `${num.toFixed(1)}YiB`;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Compact timestamp, `MM/DD-HH:MM`; empty for a missing or bad value
 */
export function formatTime(iso: string | null | undefined, options: FormatOptions = {}): string {
  if (!iso) return "";
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return "";

  if (options.utc) {
    return `${pad2(date.getUTCMonth() + 1)}/${pad2(date.getUTCDate())}-${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}`;
  }
  return `${pad2(date.getMonth() + 1)}/${pad2(date.getDate())}-${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

const COLUMNS = [
  { title: "subdir", width: 15 },
  { title: "rem_ok", width: 6 },
  { title: "mods", width: 4 },
  { title: "latest", width: 12 },
  { title: "files", width: 8 },
  { title: "size", width: 9 },
  { title: "commit", width: 8 },
  { title: "commit_time", width: 12 },
];

function formatRow(values: string[]): string {
  return values.map((value, i) => value.padStart(COLUMNS[i]?.width ?? 0)).join(" ");
}

const REMOTE_FLAGS = { "in-sync": "Y", differs: "N", unknown: "?" } as const;

function formatCell(cell: FolderCell, options: FormatOptions): string {
  const { state } = cell;
  return formatRow([
    state.name,
    REMOTE_FLAGS[remoteStatusOf(state)],
    state.hasMods ? "Y" : "N",
    formatTime(state.latestModified, options) + (cell.latest ? "*" : " "),
    String(state.fileCount),
    formatSize(state.bytes),
    (state.commit ?? "").slice(0, 7) + (cell.mixedCommit ? "*" : " "),
    formatTime(state.commitTime, options),
  ]);
}

/**
 * Render a set report as a comparison table, one block per instance
 * (local instance last), followed by warnings and remedies.
 */
export function renderReport(report: SetReport, options: FormatOptions = {}): string {
  const lines: string[] = [];

  lines.push(formatRow(COLUMNS.map((column) => column.title)));

  for (const instance of report.instances) {
    const suffix = instance.local ? " (this machine)" : "";
    lines.push(`${instance.name} ${formatTime(instance.updated, options)}${suffix}`);
    for (const row of report.folders) {
      const cell = row.cells.find((c) => c.instance === instance.name);
      if (cell) {
        lines.push(formatCell(cell, options));
      }
    }
  }

  const mixed = report.warnings.filter((warning) => warning.kind === "mixed-commits");
  if (mixed.length > 0) {
    lines.push("");
    lines.push(`WARNING: mixed commits for: ${mixed.map((warning) => warning.folder).join(", ")}`);
    for (const mismatch of report.mismatches) {
      lines.push(
        `  ${mismatch.folder}: ${mismatch.instance} at ${mismatch.commit.slice(0, 7)}, ` +
          `${mismatch.newestInstance} at ${mismatch.newestCommit.slice(0, 7)}`
      );
    }
  }

  const unknown = report.warnings.filter((warning) => warning.kind === "remote-unknown");
  if (unknown.length > 0) {
    lines.push("");
    lines.push(
      `WARNING: remote state unknown (offline?) for: ${unknown.map((warning) => warning.folder).join(", ")}`
    );
  }

  if (report.remedies.length > 0) {
    lines.push("");
    lines.push("Possible remedies");
    for (const remedy of report.remedies) {
      lines.push(remedy.command);
    }
  }

  return lines.join("\n");
}

/**
 * List configured sets and their instances. A set whose folders do not
 * resolve is flagged; the other sets are listed normally.
 */
export function renderList(store: StateStore): string {
  const lines: string[] = ["Known sets / instances", ""];
  const settings = store.getSettings();

  for (const setName of store.listSets()) {
    let problem = "";
    try {
      resolveSet(settings, setName);
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      problem = `  [${error.kind}: ${error.message}]`;
    }
    lines.push(`${setName}${problem}`);
    for (const instance of store.listInstances(setName)) {
      lines.push(`    ${instance}`);
    }
  }

  return lines.join("\n");
}
