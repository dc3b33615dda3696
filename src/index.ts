/**
 * checkstate - compare the state of git folders across machines
 */

export * from "./core/index.js";
export * from "./errors.js";
export { formatSize, formatTime, renderList, renderReport, type FormatOptions } from "./cli/format.js";
export {
  fetchStore,
  storeResults,
  type FetchedDocument,
  type SharedStorageTransport,
} from "./cli/sync/transport.js";
export {
  GitTransport,
  classifyGitFailure,
  SETTINGS_FILE,
  RESULTS_FILE,
  type GitTransportOptions,
} from "./cli/sync/git-transport.js";
export { guessTarget, type Target, type GuessOptions } from "./cli/target.js";
export {
  runCheck,
  runList,
  runShowStored,
  type CheckOptions,
  type CheckDeps,
  type CheckOutcome,
} from "./cli/commands/check.js";
