/**
 * Test fixtures for core modules
 */

import type { FolderState, InstanceState, SetState, Settings } from "../document.js";

export function folder(name: string, overrides: Partial<FolderState> = {}): FolderState {
  return {
    name,
    path: `/home/user/${name}`,
    remoteOk: true,
    remoteStatus: "in-sync",
    hasMods: false,
    latestModified: "2024-03-01T10:00:00.000Z",
    latestFile: `/home/user/${name}/README.md`,
    fileCount: 3,
    bytes: 2048,
    commit: "aaaaaaa1111111111111111111111111111111111",
    branch: "main",
    commitTime: "2024-03-01T09:00:00.000Z",
    ...overrides,
  };
}

export function instance(
  name: string,
  updated: string,
  folders: FolderState[]
): InstanceState {
  return { name, updated, folders };
}

export function setState(...instances: InstanceState[]): SetState {
  return new Map(instances.map((state) => [state.name, state]));
}

/**
 * Settings with two sets: a Windows-style one using a base path and a
 * substitution list, and a POSIX one using aliases
 */
export function sampleSettings(): Settings {
  return {
    sub: {
      std: ["folder1", "folder2", "folder3"],
      docs: ["notes", "papers"],
    },
    set: {
      project1: {
        instance: {
          work: {
            folders: [
              "d:\\somepath\\+",
              ":std",
              "extra_folder",
              "C:\\absolute\\extrafolder",
            ],
          },
        },
      },
      project2: {
        instance: {
          home: { folders: ["/home/user/+", ":docs"] },
          laptop: { folders: ":home" },
          tablet: { folders: ":laptop" },
        },
      },
    },
  };
}
