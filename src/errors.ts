/**
 * Error classes for checkstate
 *
 * Every error carries a discriminating `kind` so callers can branch on
 * the failure without matching message text, and an exit code used by
 * the CLI.
 */

export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Usage: 2,
  Config: 3,
  Store: 4,
  Transport: 5,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Base class for all checkstate errors
 */
export class CheckStateError extends Error {
  public readonly exitCode: ExitCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, exitCode: ExitCode, context?: Record<string, unknown>) {
    super(message);
    this.name = "CheckStateError";
    this.exitCode = exitCode;
    this.context = context;
  }
}

export type ConfigErrorKind =
  | "UnknownSet"
  | "UnknownInstance"
  | "UnknownSubstitution"
  | "AliasCycle"
  | "MissingFolders"
  | "RelativePath";

/**
 * Folder configuration could not be resolved for a set/instance
 */
export class ConfigError extends CheckStateError {
  public readonly kind: ConfigErrorKind;

  constructor(kind: ConfigErrorKind, message: string, context?: Record<string, unknown>) {
    super(message, ExitCodes.Config, context);
    this.name = "ConfigError";
    this.kind = kind;
  }
}

export type StoreErrorKind = "MalformedDocument";

/**
 * A persisted document (settings, results or local config) is unusable
 */
export class StoreError extends CheckStateError {
  public readonly kind: StoreErrorKind;

  constructor(kind: StoreErrorKind, message: string, context?: Record<string, unknown>) {
    super(message, ExitCodes.Store, context);
    this.name = "StoreError";
    this.kind = kind;
  }
}

export type InspectErrorKind = "NotAVcsFolder" | "PathNotFound" | "RemoteUnreachable";

export class InspectError extends CheckStateError {
  public readonly kind: InspectErrorKind;
  public readonly path: string;

  constructor(kind: InspectErrorKind, path: string, message: string) {
    super(message, ExitCodes.Failure, { path });
    this.name = "InspectError";
    this.kind = kind;
    this.path = path;
  }
}

export type TransportErrorKind = "AuthFailure" | "NetworkFailure" | "NotFound";

/**
 * Fetching or storing the shared document failed
 */
export class TransportError extends CheckStateError {
  public readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, context?: Record<string, unknown>) {
    super(message, ExitCodes.Transport, context);
    this.name = "TransportError";
    this.kind = kind;
  }
}

export type TargetErrorKind = "Ambiguous" | "NotGuessable";

/**
 * The set/instance to check could not be determined from the arguments
 * and the current directory
 */
export class TargetError extends CheckStateError {
  public readonly kind: TargetErrorKind;
  public readonly choices: Array<[string, string]>;

  constructor(kind: TargetErrorKind, message: string, choices: Array<[string, string]> = []) {
    super(message, ExitCodes.Usage, { choices });
    this.name = "TargetError";
    this.kind = kind;
    this.choices = choices;
  }
}

/**
 * Log an error with context through an optional debug callback.
 */
export function logError(
  context: string,
  error: unknown,
  debug?: (msg: string) => void
): void {
  const message = error instanceof Error ? error.message : String(error);
  if (debug) {
    debug(`[${context}] Error: ${message}`);
  }
}
