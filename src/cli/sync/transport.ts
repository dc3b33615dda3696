/**
 * Shared storage transport
 *
 * Moves the settings and results documents between the shared
 * repository and this run. The repository locator is fixed when the
 * transport is created.
 */

import { StoreError } from "../../errors.js";
import { stringifySorted } from "../../core/document.js";
import { StateStore } from "../../core/store.js";

export type FetchedDocument = {
  settings: string;
  /** null when no results have been stored yet */
  results: string | null;
};

export interface SharedStorageTransport {
  readonly locator: string;
  fetch(): Promise<FetchedDocument>;
  /** Persist the results document. Settings are never written. */
  store(results: string): Promise<void>;
  /** Release anything held since fetch (temporary checkouts) */
  dispose(): Promise<void>;
}

function parseJson(text: string, document: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new StoreError(
      "MalformedDocument",
      `Invalid JSON in ${document} document: ${error instanceof Error ? error.message : String(error)}`,
      { document }
    );
  }
}

/**
 * Fetch and load the shared document
 */
export async function fetchStore(transport: SharedStorageTransport): Promise<StateStore> {
  const fetched = await transport.fetch();
  return StateStore.load({
    settings: parseJson(fetched.settings, "settings"),
    results: fetched.results === null ? undefined : parseJson(fetched.results, "results"),
  });
}

/**
 * Write the results back through the transport
 */
export async function storeResults(
  transport: SharedStorageTransport,
  store: StateStore
): Promise<void> {
  const { results } = store.serialize();
  await transport.store(`${stringifySorted(results)}\n`);
}
