/**
 * Tests for folder list resolution
 */

import { describe, it, expect } from "vitest";

import { ConfigError } from "../../errors.js";
import type { Settings } from "../document.js";
import {
  isAbsoluteAnyOs,
  joinAnyOs,
  pathBasename,
  resolveFolders,
  resolveSet,
} from "../resolver.js";
import { sampleSettings } from "./helpers.js";

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error("expected a ConfigError");
}

function withInstances(
  instances: Settings["set"][string]["instance"],
  sub: Settings["sub"] = {}
): Settings {
  return { sub, set: { s: { instance: instances } } };
}

describe("path helpers", () => {
  it("should take the basename of either separator style", () => {
    expect(pathBasename("/home/user/notes")).toBe("notes");
    expect(pathBasename("d:\\somepath\\folder1")).toBe("folder1");
    expect(pathBasename("/home/user/notes/")).toBe("notes");
  });

  it("should recognise absolute paths from any OS", () => {
    expect(isAbsoluteAnyOs("/tmp")).toBe(true);
    expect(isAbsoluteAnyOs("C:\\x")).toBe(true);
    expect(isAbsoluteAnyOs("\\\\server\\share")).toBe(true);
    expect(isAbsoluteAnyOs("relative/dir")).toBe(false);
    expect(isAbsoluteAnyOs("c:relative")).toBe(false);
  });

  it("should join using the base's separator", () => {
    expect(joinAnyOs("/home/user", "notes")).toBe("/home/user/notes");
    expect(joinAnyOs("/home/user/", "notes")).toBe("/home/user/notes");
    expect(joinAnyOs("d:\\somepath", "folder1")).toBe("d:\\somepath\\folder1");
    expect(joinAnyOs("d:", "folder1")).toBe("d:\\folder1");
  });
});

describe("resolveFolders", () => {
  it("should expand base, substitution list, literal and absolute tokens in order", () => {
    const folders = resolveFolders(sampleSettings(), "project1", "work");

    expect(folders.map((f) => f.path)).toEqual([
      "d:\\somepath\\folder1",
      "d:\\somepath\\folder2",
      "d:\\somepath\\folder3",
      "d:\\somepath\\extra_folder",
      "C:\\absolute\\extrafolder",
    ]);
    expect(folders.map((f) => f.name)).toEqual([
      "folder1",
      "folder2",
      "folder3",
      "extra_folder",
      "extrafolder",
    ]);
  });

  it("should resolve an alias to the same list as its target", () => {
    const settings = sampleSettings();
    const home = resolveFolders(settings, "project2", "home");

    expect(resolveFolders(settings, "project2", "laptop")).toEqual(home);
    expect(home.map((f) => f.path)).toEqual(["/home/user/notes", "/home/user/papers"]);
  });

  it("should follow alias chains", () => {
    const settings = sampleSettings();
    expect(resolveFolders(settings, "project2", "tablet")).toEqual(
      resolveFolders(settings, "project2", "home")
    );
  });

  it("should be deterministic", () => {
    const settings = sampleSettings();
    const first = resolveFolders(settings, "project1", "work");
    const second = resolveFolders(settings, "project1", "work");
    expect(second).toEqual(first);
  });

  it("should expand inline lists under the base", () => {
    const settings = withInstances({ a: { folders: ["/srv/+", ["one", "two"], "three"] } });
    expect(resolveFolders(settings, "s", "a").map((f) => f.path)).toEqual([
      "/srv/one",
      "/srv/two",
      "/srv/three",
    ]);
  });

  it("should let a relative base extend the current base", () => {
    const settings = withInstances({ a: { folders: ["/srv/+", "projects/+", "x"] } });
    expect(resolveFolders(settings, "s", "a").map((f) => f.path)).toEqual(["/srv/projects/x"]);
  });

  it("should accept a single absolute path as a bare string", () => {
    const settings = withInstances({ a: { folders: "/srv/only" } });
    expect(resolveFolders(settings, "s", "a")).toEqual([{ name: "only", path: "/srv/only" }]);
  });

  it("should fail for an unknown set", () => {
    expect(configErrorOf(() => resolveFolders(sampleSettings(), "nope", "work")).kind).toBe(
      "UnknownSet"
    );
  });

  it("should fail for an unknown instance", () => {
    expect(configErrorOf(() => resolveFolders(sampleSettings(), "project1", "nope")).kind).toBe(
      "UnknownInstance"
    );
  });

  it("should name the aliasing instance when an alias target is missing", () => {
    const settings = withInstances({ a: { folders: ":ghost" } });
    const error = configErrorOf(() => resolveFolders(settings, "s", "a"));
    expect(error.kind).toBe("UnknownInstance");
    expect(error.message).toBe("Unknown instance 'ghost' in set 's' (aliased from 'a')");
  });

  it("should detect alias cycles", () => {
    const settings = withInstances({
      a: { folders: ":b" },
      b: { folders: ":c" },
      c: { folders: ":a" },
    });
    const error = configErrorOf(() => resolveFolders(settings, "s", "a"));
    expect(error.kind).toBe("AliasCycle");
    expect(error.message).toBe("Alias cycle in 's': a -> b -> c -> a");
  });

  it("should detect self-aliases", () => {
    const settings = withInstances({ a: { folders: ":a" } });
    expect(configErrorOf(() => resolveFolders(settings, "s", "a")).kind).toBe("AliasCycle");
  });

  it("should fail for an unknown substitution list", () => {
    const settings = withInstances({ a: { folders: ["/srv/+", ":missing"] } });
    const error = configErrorOf(() => resolveFolders(settings, "s", "a"));
    expect(error.kind).toBe("UnknownSubstitution");
    expect(error.context).toEqual({ set: "s", instance: "a", substitution: "missing" });
  });

  it("should fail for missing or empty folders", () => {
    const settings = withInstances({ a: {}, b: { folders: [] }, c: { folders: ["/srv/+"] } });
    expect(configErrorOf(() => resolveFolders(settings, "s", "a")).kind).toBe("MissingFolders");
    expect(configErrorOf(() => resolveFolders(settings, "s", "b")).kind).toBe("MissingFolders");
    expect(configErrorOf(() => resolveFolders(settings, "s", "c")).kind).toBe("MissingFolders");
  });

  it("should reject relative fragments before any base", () => {
    const settings = withInstances({ a: { folders: ["relative", "/srv/+"] } });
    expect(configErrorOf(() => resolveFolders(settings, "s", "a")).kind).toBe("RelativePath");
  });

  it("should reject a relative base with no base before it", () => {
    const settings = withInstances({ a: { folders: ["srv/+", "x"] } });
    expect(configErrorOf(() => resolveFolders(settings, "s", "a")).kind).toBe("RelativePath");
  });
});

describe("resolveSet", () => {
  it("should resolve every instance in configuration order", () => {
    const resolved = resolveSet(sampleSettings(), "project2");
    expect([...resolved.keys()]).toEqual(["home", "laptop", "tablet"]);
    expect(resolved.get("tablet")).toEqual(resolved.get("home"));
  });

  it("should fail on the first broken instance", () => {
    const settings = withInstances({ ok: { folders: ["/srv/x"] }, bad: { folders: ":ghost" } });
    expect(configErrorOf(() => resolveSet(settings, "s")).kind).toBe("UnknownInstance");
  });
});
