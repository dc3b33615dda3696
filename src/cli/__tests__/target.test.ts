/**
 * Tests for guessing the set/instance from the current folder
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { ConfigError, TargetError } from "../../errors.js";
import type { Settings } from "../../core/document.js";
import { guessTarget } from "../target.js";

function settings(): Settings {
  return {
    sub: {},
    set: {
      alpha: {
        instance: {
          desk: { folders: ["/srv/+", "shared", "alpha-only"] },
          lap: { folders: ["/mnt/+", "shared"] },
        },
      },
      beta: {
        instance: {
          desk: { folders: ["/srv/shared", "/srv/beta-only"] },
          broken: { folders: ":ghost" },
        },
      },
    },
  };
}

function targetErrorOf(fn: () => unknown): TargetError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TargetError) return error;
    throw error;
  }
  throw new Error("expected a TargetError");
}

describe("guessTarget", () => {
  it("should find the only instance containing the folder", () => {
    expect(guessTarget({ settings: settings(), cwd: "/srv/alpha-only", seen: [] })).toEqual({
      set: "alpha",
      instance: "desk",
      guessed: true,
    });
  });

  it("should match with a trailing separator", () => {
    expect(guessTarget({ settings: settings(), cwd: "/mnt/shared/", seen: [] }).instance).toBe(
      "lap"
    );
  });

  it("should report every candidate when ambiguous", () => {
    const error = targetErrorOf(() =>
      guessTarget({ settings: settings(), cwd: "/srv/shared", seen: [] })
    );

    expect(error.kind).toBe("Ambiguous");
    expect(error.choices).toEqual([
      ["alpha", "desk"],
      ["beta", "desk"],
    ]);
  });

  it("should prefer a target this machine has checked before", () => {
    expect(
      guessTarget({ settings: settings(), cwd: "/srv/shared", seen: [["beta", "desk"]] })
    ).toEqual({ set: "beta", instance: "desk", guessed: true });
  });

  it("should restrict the guess to the given set", () => {
    expect(
      guessTarget({ settings: settings(), cwd: "/srv/shared", seen: [], set: "alpha" })
    ).toEqual({ set: "alpha", instance: "desk", guessed: true });
  });

  it("should fail for an unknown set", () => {
    expect(() =>
      guessTarget({ settings: settings(), cwd: "/srv/shared", seen: [], set: "gamma" })
    ).toThrow(ConfigError);
  });

  it("should fail when no instance contains the folder", () => {
    const messages: string[] = [];
    const error = targetErrorOf(() =>
      guessTarget({
        settings: settings(),
        cwd: "/elsewhere",
        seen: [],
        debug: (message) => messages.push(message),
      })
    );

    expect(error.kind).toBe("NotGuessable");
    expect(messages.filter((message) => message.startsWith("skipping"))).toEqual([
      "skipping beta/broken while guessing: Unknown instance 'ghost' in set 'beta' (aliased from 'broken')",
    ]);
  });

  describe("with symlinks", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "checkstate-target-test-"));
      await fs.mkdir(path.join(tempDir, "real", "x"), { recursive: true });
      await fs.symlink(path.join(tempDir, "real"), path.join(tempDir, "link"));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("should match a folder configured through a symlink", () => {
      const linked: Settings = {
        sub: {},
        set: { gamma: { instance: { desk: { folders: [path.join(tempDir, "link", "x")] } } } },
      };

      expect(
        guessTarget({ settings: linked, cwd: path.join(tempDir, "real", "x"), seen: [] })
      ).toEqual({ set: "gamma", instance: "desk", guessed: true });
    });

    it("should match when the current folder is reached through a symlink", () => {
      const direct: Settings = {
        sub: {},
        set: { gamma: { instance: { desk: { folders: [path.join(tempDir, "real", "x")] } } } },
      };

      expect(
        guessTarget({ settings: direct, cwd: path.join(tempDir, "link", "x"), seen: [] })
      ).toEqual({ set: "gamma", instance: "desk", guessed: true });
    });
  });
});
