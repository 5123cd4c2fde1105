import { describe, it, expect, vi } from "vitest";
import { join } from "node:path";
import pino from "pino";
import { findFiles } from "./find.js";
import type { DirectoryEntry, ListDirectory } from "./listing.js";
import { WalkError } from "../utils/errors.js";

const ROOT = "/work";
const FILES = ["a/a.test1", "a/b.test2", "b/a.test1", "b/b.test2", "x", "x.test1"];
const logger = pino({ level: "silent" });

/**
 * Builds an in-memory listing holding `files` under `root`. Entries are
 * listed in the order they first appear in `files`.
 */
function memoryListing(root: string, files: string[]) {
  const dirs = new Map<string, DirectoryEntry[]>([[root, []]]);

  for (const file of files) {
    const names = file.split("/");
    let dir = root;
    names.forEach((name, index) => {
      const isDirectory = index < names.length - 1;
      const entries = dirs.get(dir) ?? [];
      if (!entries.some((entry) => entry.name === name)) {
        entries.push({ name, isDirectory });
      }
      dirs.set(dir, entries);
      dir = join(dir, name);
      if (isDirectory && !dirs.has(dir)) dirs.set(dir, []);
    });
  }

  return vi.fn<ListDirectory>(async (dir) => {
    const entries = dirs.get(dir);
    if (!entries) {
      throw Object.assign(
        new Error(`ENOENT: no such file or directory, scandir '${dir}'`),
        { code: "ENOENT" },
      );
    }
    return entries;
  });
}

describe("findFiles", () => {
  const cases = [
    {
      include: ["**"],
      exclude: [],
      expected: FILES,
    },
    {
      include: ["**/*.test1"],
      exclude: [],
      expected: ["a/a.test1", "b/a.test1", "x.test1"],
    },
    {
      include: ["**"],
      exclude: ["*.test1"],
      expected: ["a/a.test1", "a/b.test2", "b/a.test1", "b/b.test2", "x"],
    },
    {
      include: ["**"],
      exclude: ["a"],
      expected: ["b/a.test1", "b/b.test2", "x", "x.test1"],
    },
    {
      include: ["**"],
      exclude: ["a/"],
      expected: ["b/a.test1", "b/b.test2", "x", "x.test1"],
    },
    {
      include: ["**"],
      exclude: ["**/*.test1", "**/*.test2"],
      expected: ["x"],
    },
  ];

  for (const c of cases) {
    it(`include ${JSON.stringify(c.include)}, exclude ${JSON.stringify(c.exclude)}`, async () => {
      const listDirectory = memoryListing(ROOT, FILES);
      const result = await findFiles(ROOT, c.include, c.exclude, {
        listDirectory,
        logger,
      });
      expect(result.paths).toEqual(c.expected);
      expect(result.errors).toEqual([]);
    });
  }

  it("returns entries in listing order, depth first", async () => {
    const listDirectory = memoryListing(ROOT, ["z", "m/inner", "a"]);
    const result = await findFiles(ROOT, ["**"], [], { listDirectory, logger });
    expect(result.paths).toEqual(["z", "m/inner", "a"]);
  });

  it("walks only the base paths of the include patterns", async () => {
    const listDirectory = memoryListing(ROOT, ["src/a.ts", "src/util/b.ts", "lib/c.ts"]);
    const result = await findFiles(ROOT, ["src/**/*.ts"], [], {
      listDirectory,
      logger,
    });
    expect(result.paths).toEqual(["src/a.ts", "src/util/b.ts"]);
    expect(listDirectory.mock.calls.map(([dir]) => dir)).toEqual([
      "/work/src",
      "/work/src/util",
    ]);
  });

  it("descends into directories that match no include", async () => {
    const listDirectory = memoryListing(ROOT, ["deep/er/x.ts", "deep/y.js"]);
    const result = await findFiles(ROOT, ["**/*.ts"], [], { listDirectory, logger });
    expect(result.paths).toEqual(["deep/er/x.ts"]);
  });

  it("never lists an excluded directory", async () => {
    const listDirectory = memoryListing(ROOT, ["node_modules/pkg/index.js", "index.js"]);
    const result = await findFiles(ROOT, ["**"], ["node_modules"], {
      listDirectory,
      logger,
    });
    expect(result.paths).toEqual(["index.js"]);
    expect(listDirectory).toHaveBeenCalledTimes(1);
    expect(listDirectory).toHaveBeenCalledWith("/work");
  });

  it("skips a base path that is itself excluded", async () => {
    const listDirectory = memoryListing(ROOT, ["src/a.ts"]);
    const result = await findFiles(ROOT, ["src/**"], ["src"], {
      listDirectory,
      logger,
    });
    expect(result.paths).toEqual([]);
    expect(listDirectory).not.toHaveBeenCalled();
  });

  it("walks each directory once for overlapping include patterns", async () => {
    const listDirectory = memoryListing(ROOT, ["src/a.ts", "b.ts"]);
    const result = await findFiles(ROOT, ["src/*.ts", "**/*.ts"], [], {
      listDirectory,
      logger,
    });
    expect(result.paths).toEqual(["src/a.ts", "b.ts"]);
    expect(listDirectory.mock.calls.map(([dir]) => dir)).toEqual([
      "/work",
      "/work/src",
    ]);
  });

  it("reports absolute matches for absolute patterns", async () => {
    const listDirectory = memoryListing("/opt/app", ["x", "sub/y"]);
    const result = await findFiles(ROOT, ["/opt/app/**"], [], {
      listDirectory,
      logger,
    });
    expect(result.paths).toEqual(["/opt/app/x", "/opt/app/sub/y"]);
  });

  it("walks a base above the root on its own", async () => {
    const sibling = memoryListing("/x", ["b"]);
    const own = memoryListing(ROOT, ["a"]);
    const listDirectory = vi.fn<ListDirectory>((dir) =>
      dir.startsWith("/x") ? sibling(dir) : own(dir),
    );

    const result = await findFiles(ROOT, ["../x/**", "*"], [], {
      listDirectory,
      logger,
    });

    expect(result.paths).toEqual(["../x/b", "a"]);
    expect(listDirectory.mock.calls.map(([dir]) => dir)).toEqual(["/x", "/work"]);
  });

  it("selects nothing and lists nothing without include patterns", async () => {
    const listDirectory = memoryListing(ROOT, FILES);
    const result = await findFiles(ROOT, [], ["*"], { listDirectory, logger });
    expect(result).toEqual({ paths: [], errors: [] });
    expect(listDirectory).not.toHaveBeenCalled();
  });

  it("ignores an invalid exclude pattern and reports it", async () => {
    const listDirectory = memoryListing(ROOT, FILES);
    const result = await findFiles(ROOT, ["*"], ["[["], { listDirectory, logger });
    expect(result.paths).toEqual(["x", "x.test1"]);
    expect(result.errors.map((e) => e.pattern)).toEqual(["[["]);
  });

  describe("listing failures", () => {
    it("rejects with a WalkError for a missing base path", async () => {
      const listDirectory = memoryListing(ROOT, FILES);
      const promise = findFiles(ROOT, ["missing/**"], [], { listDirectory, logger });
      await expect(promise).rejects.toBeInstanceOf(WalkError);
      await expect(promise).rejects.toThrow(
        "failed to list directory '/work/missing': ENOENT: no such file or directory, scandir '/work/missing'",
      );
    });

    it("aborts the walk when a nested directory cannot be listed", async () => {
      const inner = memoryListing(ROOT, FILES);
      const cause = new Error("EACCES: permission denied");
      const listDirectory = vi.fn<ListDirectory>(async (dir) => {
        if (dir === "/work/b") throw cause;
        return inner(dir);
      });

      const error: unknown = await findFiles(ROOT, ["**"], [], {
        listDirectory,
        logger,
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WalkError);
      if (error instanceof WalkError) {
        expect(error.path).toBe("/work/b");
        expect(error.cause).toBe(cause);
      }
      expect(listDirectory.mock.calls.map(([dir]) => dir)).toEqual([
        "/work",
        "/work/a",
        "/work/b",
      ]);
    });
  });
});
