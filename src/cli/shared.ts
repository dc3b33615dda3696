/**
 * Shared CLI utilities
 *
 * Message formatting and error exits used by all CLI commands.
 */

import { CheckStateError, ExitCodes, type ExitCode } from "../errors.js";
import type { DebugFn } from "../core/inspector.js";

/**
 * Exit with an error message and optional suggestion.
 *
 * All CLI errors should use this for consistent formatting.
 */
export function exitWithError(
  message: string,
  suggestion?: string,
  code: ExitCode = ExitCodes.Failure
): never {
  console.error(`Error: ${message}`);
  if (suggestion) {
    console.error(`  Suggestion: ${suggestion}`);
  }
  process.exit(code);
}

/** Where warnings and notes go; stderr unless a command redirects it */
export type MessageSink = {
  error(line: string): void;
};

/**
 * Print a warning message (non-fatal).
 */
export function warn(message: string, sink: MessageSink = console): void {
  sink.error(`Warning: ${message}`);
}

/**
 * Print a note/informational message.
 */
export function note(message: string, sink: MessageSink = console): void {
  sink.error(`Note: ${message}`);
}

/**
 * Debug logger for --verbose, or undefined when quiet
 */
export function createDebug(verbose: boolean | undefined): DebugFn | undefined {
  if (!verbose) return undefined;
  return (message, data) => {
    const suffix = data ? ` ${JSON.stringify(data)}` : "";
    console.error(`[debug] ${message}${suffix}`);
  };
}

/**
 * Exit code for an error escaping a command
 */
export function exitCodeOf(error: unknown): ExitCode {
  return error instanceof CheckStateError ? error.exitCode : ExitCodes.Failure;
}
