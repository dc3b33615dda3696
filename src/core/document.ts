/**
 * Persisted document schemas
 *
 * The shared repository holds two JSON documents:
 * - settings: substitution lists (`sub`) and the project configuration
 *   (`set`), edited by hand and never written by this tool
 * - results: per set, per instance observations (`obs`), rewritten on
 *   every stored run
 *
 * Both are validated with zod on load. Unknown keys pass through so a
 * newer writer's additions survive a round-trip.
 */

import { z } from "zod";

import { StoreError } from "../errors.js";

/** Set name reserved for the example entry in the settings document */
export const TEMPLATE_SET = "_TEMPLATE_";

// =============================================================================
// Settings
// =============================================================================

/** A folder token, or an inline list of literal fragments */
export const FolderTokenSchema = z.union([z.string(), z.array(z.string())]);

/** Either an alias (`":other"`) or an ordered token list */
export const FoldersValueSchema = z.union([z.string(), z.array(FolderTokenSchema)]);

export const InstanceConfigSchema = z
  .object({
    folders: FoldersValueSchema.optional(),
  })
  .passthrough();

export const SetConfigSchema = z
  .object({
    instance: z.record(InstanceConfigSchema),
  })
  .passthrough();

export const SubstitutionTableSchema = z.record(z.array(z.string()));

const SettingsDocumentSchema = z
  .object({
    sub: SubstitutionTableSchema.optional(),
    set: z.record(z.unknown()),
  })
  .passthrough();

export type FolderToken = z.infer<typeof FolderTokenSchema>;
export type FoldersValue = z.infer<typeof FoldersValueSchema>;
export type InstanceConfig = z.infer<typeof InstanceConfigSchema>;
export type SetConfig = z.infer<typeof SetConfigSchema>;
export type SubstitutionTable = z.infer<typeof SubstitutionTableSchema>;

/** Set name -> set configuration, template excluded */
export type ProjectConfig = Record<string, SetConfig>;

export type Settings = {
  sub: SubstitutionTable;
  set: ProjectConfig;
};

// =============================================================================
// Results
// =============================================================================

/**
 * What the instance knew about its upstream at record time.
 * "unknown" means the remote could not be reached.
 */
export const RemoteStatusSchema = z.enum(["in-sync", "differs", "unknown"]);

export type RemoteStatus = z.infer<typeof RemoteStatusSchema>;

export const FolderStateSchema = z
  .object({
    /** Display name (final path component) */
    name: z.string(),
    /** Path as seen on the recording instance */
    path: z.string(),
    remoteOk: z.boolean(),
    remoteStatus: RemoteStatusSchema.optional(),
    hasMods: z.boolean(),
    /** Most recent file modification (ISO), null for an empty folder */
    latestModified: z.string().nullable().optional(),
    latestFile: z.string().nullable().optional(),
    fileCount: z.number().int().nonnegative(),
    bytes: z.number().nonnegative(),
    commit: z.string().nullable().optional(),
    branch: z.string().nullable().optional(),
    commitTime: z.string().nullable().optional(),
  })
  .passthrough();

export type FolderState = z.infer<typeof FolderStateSchema>;

export const InstanceRecordSchema = z
  .object({
    updated: z.string(),
    subdirs: z.array(FolderStateSchema),
  })
  .passthrough();

const ResultsDocumentSchema = z
  .object({
    obs: z.record(z.record(InstanceRecordSchema)),
  })
  .passthrough();

export type InstanceRecord = z.infer<typeof InstanceRecordSchema>;

/**
 * One instance's observations of a set
 */
export type InstanceState = {
  name: string;
  /** When this record was produced (ISO) */
  updated: string;
  folders: FolderState[];
};

/** Instance name -> state, in insertion order */
export type SetState = Map<string, InstanceState>;

export type JsonObject = Record<string, unknown>;

/**
 * The full store as handed over by the transport
 */
export type PersistedDocument = {
  settings: JsonObject;
  results: JsonObject;
};

export function createEmptyResults(): JsonObject {
  return { obs: {} };
}

// =============================================================================
// Parsing
// =============================================================================

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

function malformed(document: string, error: z.ZodError): StoreError {
  return new StoreError(
    "MalformedDocument",
    `Malformed ${document} document: ${describeIssues(error)}`,
    { document, issues: error.issues }
  );
}

/**
 * Check that a parsed JSON value is an object
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse the settings document. The template set is validated loosely
 * and left out of the returned project configuration.
 */
export function parseSettings(raw: unknown): Settings {
  const parsed = SettingsDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw malformed("settings", parsed.error);
  }

  const sets: ProjectConfig = {};
  for (const [name, value] of Object.entries(parsed.data.set)) {
    if (name === TEMPLATE_SET) continue;
    const setConfig = SetConfigSchema.safeParse(value);
    if (!setConfig.success) {
      const error = new z.ZodError(
        setConfig.error.issues.map((issue) => ({ ...issue, path: ["set", name, ...issue.path] }))
      );
      throw malformed("settings", error);
    }
    sets[name] = setConfig.data;
  }

  return { sub: parsed.data.sub ?? {}, set: sets };
}

/**
 * Parse the results document into per-set state
 */
export function parseResults(raw: unknown): Map<string, SetState> {
  const parsed = ResultsDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw malformed("results", parsed.error);
  }

  const sets = new Map<string, SetState>();
  for (const [setName, instances] of Object.entries(parsed.data.obs)) {
    const state: SetState = new Map();
    for (const [instanceName, record] of Object.entries(instances)) {
      state.set(instanceName, {
        name: instanceName,
        updated: record.updated,
        folders: record.subdirs,
      });
    }
    sets.set(setName, state);
  }
  return sets;
}

/**
 * Convert an instance state to its on-disk record
 */
export function toInstanceRecord(state: InstanceState): InstanceRecord {
  return {
    updated: state.updated,
    subdirs: state.folders.map((folder) => ({ ...folder })),
  };
}

/**
 * Look up an own property of a record
 */
export function own<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * JSON.stringify with object keys sorted at every level.
 * Keeps diffs in the shared repository small.
 */
export function stringifySorted(value: unknown, indent = 2): string {
  return JSON.stringify(sortKeys(value), null, indent);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isJsonObject(value)) {
    const sorted: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}
