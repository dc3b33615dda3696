/**
 * State store
 *
 * Holds the working copy of the shared document for one run: the
 * settings (read-only) and the per-set, per-instance results.
 *
 * The raw results object is kept alongside the parsed view, and only
 * `recordLocal` touches it, so serializing writes back every untouched
 * set and instance exactly as it was loaded.
 */

import {
  TEMPLATE_SET,
  createEmptyResults,
  isJsonObject,
  own,
  parseResults,
  parseSettings,
  toInstanceRecord,
  type FolderState,
  type InstanceState,
  type JsonObject,
  type PersistedDocument,
  type SetState,
  type Settings,
} from "./document.js";
import { StoreError } from "../errors.js";

export type StoreLoadInput = {
  settings: unknown;
  /** Missing results mean no instance has been recorded yet */
  results?: unknown;
};

export class StateStore {
  private readonly rawSettings: JsonObject;
  private readonly rawResults: JsonObject;
  private readonly settings: Settings;
  private readonly observations: Map<string, SetState>;

  private constructor(
    rawSettings: JsonObject,
    rawResults: JsonObject,
    settings: Settings,
    observations: Map<string, SetState>
  ) {
    this.rawSettings = rawSettings;
    this.rawResults = rawResults;
    this.settings = settings;
    this.observations = observations;
  }

  /**
   * Parse a fetched document. Fails with `StoreError(MalformedDocument)`
   * when a required section is missing or has the wrong shape.
   */
  static load(input: StoreLoadInput): StateStore {
    if (!isJsonObject(input.settings)) {
      throw new StoreError("MalformedDocument", "Malformed settings document: not an object");
    }
    const results = input.results ?? createEmptyResults();
    if (!isJsonObject(results)) {
      throw new StoreError("MalformedDocument", "Malformed results document: not an object");
    }

    const settings = parseSettings(input.settings);
    const observations = parseResults(results);

    return new StateStore(
      structuredClone(input.settings),
      structuredClone(results),
      settings,
      observations
    );
  }

  getSettings(): Settings {
    return this.settings;
  }

  /**
   * Configured sets, template excluded
   */
  listSets(): string[] {
    return Object.keys(this.settings.set);
  }

  /**
   * Configured instances of a set; empty for an unknown set
   */
  listInstances(setName: string): string[] {
    if (setName === TEMPLATE_SET) return [];
    const setConfig = own(this.settings.set, setName);
    return setConfig ? Object.keys(setConfig.instance) : [];
  }

  /**
   * Sets that have stored results, template excluded
   */
  storedSets(): string[] {
    return [...this.observations.keys()].filter((name) => name !== TEMPLATE_SET);
  }

  /**
   * Known state of a set. The returned map is a copy; mutating it does
   * not affect the store.
   */
  getSetState(setName: string): SetState {
    return new Map(this.observations.get(setName) ?? []);
  }

  /**
   * Insert or overwrite the record of `instanceName` in `setName` with a
   * fresh state timestamped `now`. Other instances are left untouched.
   */
  recordLocal(
    setName: string,
    instanceName: string,
    folders: FolderState[],
    now: Date = new Date()
  ): InstanceState {
    const state: InstanceState = {
      name: instanceName,
      updated: now.toISOString(),
      folders: folders.map((folder) => ({ ...folder })),
    };

    let setState = this.observations.get(setName);
    if (!setState) {
      setState = new Map();
      this.observations.set(setName, setState);
    }
    setState.set(instanceName, state);

    const obs = this.rawObs();
    const rawSet = own(obs, setName);
    const setRecords: JsonObject = isJsonObject(rawSet) ? rawSet : {};
    setRecords[instanceName] = toInstanceRecord(state);
    obs[setName] = setRecords;

    return state;
  }

  /**
   * Document for persistence. Settings are returned as loaded.
   */
  serialize(): PersistedDocument {
    return {
      settings: structuredClone(this.rawSettings),
      results: structuredClone(this.rawResults),
    };
  }

  private rawObs(): JsonObject {
    const obs = own(this.rawResults, "obs");
    if (isJsonObject(obs)) {
      return obs;
    }
    const created: JsonObject = {};
    this.rawResults.obs = created;
    return created;
  }
}
