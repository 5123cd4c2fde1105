import { readdir } from "node:fs/promises";

/**
 * One immediate child of a listed directory.
 */
export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

/**
 * Lists the immediate entries of a directory. Rejects when the directory
 * cannot be read.
 */
export type ListDirectory = (dir: string) => Promise<DirectoryEntry[]>;

function compareNames(a: DirectoryEntry, b: DirectoryEntry): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Default listing backed by the local filesystem, sorted by name so walks
 * are deterministic. Symbolic links are reported as files and never followed.
 */
export const listDirectory: ListDirectory = async (dir) => {
  const dirents = await readdir(dir, { withFileTypes: true });
  return dirents
    .map((dirent) => ({ name: dirent.name, isDirectory: dirent.isDirectory() }))
    .sort(compareNames);
};
