/**
 * Error classes and exit codes
 */

import { describe, it, expect, vi } from "vitest";

import {
  CheckStateError,
  ConfigError,
  ExitCodes,
  InspectError,
  StoreError,
  TargetError,
  TransportError,
  logError,
} from "../errors.js";
import { exitCodeOf } from "../cli/shared.js";

describe("error classes", () => {
  it("maps each failure family to its exit code", () => {
    expect(new ConfigError("AliasCycle", "cycle").exitCode).toBe(ExitCodes.Config);
    expect(new StoreError("MalformedDocument", "bad").exitCode).toBe(ExitCodes.Store);
    expect(new TransportError("AuthFailure", "denied").exitCode).toBe(ExitCodes.Transport);
    expect(new TargetError("NotGuessable", "no guess").exitCode).toBe(ExitCodes.Usage);
    expect(new InspectError("PathNotFound", "/srv/x", "gone").exitCode).toBe(ExitCodes.Failure);
  });

  it("keeps kind, name and context", () => {
    const error = new ConfigError("UnknownSet", "Unknown set 'a'", { set: "a" });

    expect(error).toBeInstanceOf(CheckStateError);
    expect(error.name).toBe("ConfigError");
    expect(error.kind).toBe("UnknownSet");
    expect(error.context).toEqual({ set: "a" });
  });

  it("carries the candidates of an ambiguous target", () => {
    const error = new TargetError("Ambiguous", "ambiguous", [["a", "desk"]]);
    expect(error.choices).toEqual([["a", "desk"]]);
    expect(error.context).toEqual({ choices: [["a", "desk"]] });
  });

  it("uses the generic failure code for foreign errors", () => {
    expect(exitCodeOf(new Error("boom"))).toBe(ExitCodes.Failure);
    expect(exitCodeOf("boom")).toBe(ExitCodes.Failure);
    expect(exitCodeOf(new StoreError("MalformedDocument", "bad"))).toBe(ExitCodes.Store);
  });
});

describe("logError", () => {
  it("passes context and message to the debug callback", () => {
    const debug = vi.fn();
    logError("git push", new Error("rejected"), debug);
    logError("stat", "ENOENT", debug);

    expect(debug).toHaveBeenNthCalledWith(1, "[git push] Error: rejected");
    expect(debug).toHaveBeenNthCalledWith(2, "[stat] Error: ENOENT");
  });

  it("does nothing without a callback", () => {
    expect(() => logError("git push", new Error("rejected"))).not.toThrow();
  });
});
