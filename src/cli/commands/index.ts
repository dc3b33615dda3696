/**
 * CLI Commands
 */

export {
  check,
  runCheck,
  runList,
  runShowStored,
  type CheckOptions,
  type CheckDeps,
  type CheckOutcome,
  type Output,
} from "./check.js";
