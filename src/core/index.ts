/**
 * Core module - resolution, storage, inspection and reconciliation
 *
 * Nothing here talks to the shared repository or prints; the CLI layer
 * wires these together.
 */

export * from "./document.js";
export * from "./resolver.js";
export { StateStore, type StoreLoadInput } from "./store.js";
export * from "./inspector.js";
export * from "./reconciler.js";
export { ok, err, type Result } from "./result.js";
