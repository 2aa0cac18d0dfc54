import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { symlinkSync } from "fs";
import { join } from "path";
import { matchesExtension, readTextFile, shouldExcludeDir, walkRepository } from "../src/scan/walker.js";
import { DEFAULT_EXCLUDED_DIRS, DEFAULT_INCLUDE_EXTS } from "../src/config/constants.js";
import type { WalkOptions } from "../src/scan/types.js";
import { createTempDir, removeDir, writeTree } from "./fixtures.js";

const options: WalkOptions = {
  excludedDirs: new Set(DEFAULT_EXCLUDED_DIRS),
  includeExts: new Set(DEFAULT_INCLUDE_EXTS),
  maxFileSizeBytes: 50,
};

function relativePaths(repo: string, walkOptions: WalkOptions = options): string[] {
  return [...walkRepository(repo, walkOptions)].map((f) => f.relativePath);
}

describe("walkRepository", () => {
  let repo: string;

  beforeEach(() => {
    repo = createTempDir();
    writeTree(repo, {
      "src/a.ts": "// TODO: a\n",
      "src/b.md": "notes\n",
      "node_modules/x/index.js": "// TODO: vendored\n",
      ".hidden/c.ts": "// TODO: hidden\n",
      "Dockerfile": "FROM node:20\n",
      "big.txt": "x".repeat(100),
      "notes.unknown": "TODO: unknown type\n",
    });
  });

  afterEach(() => {
    removeDir(repo);
  });

  it("should apply directory, extension and size filters in a stable order", () => {
    expect(relativePaths(repo)).toEqual(["Dockerfile", "src/a.ts", "src/b.md"]);
  });

  it("should be restartable", () => {
    const files = walkRepository(repo, options);
    const first = [...files].map((f) => f.relativePath);
    const second = [...files].map((f) => f.relativePath);

    expect(second).toEqual(first);
  });

  it("should report absolute paths and sizes", () => {
    const [dockerfile] = [...walkRepository(repo, options)];

    expect(dockerfile.absolutePath).toBe(join(repo, "Dockerfile"));
    expect(dockerfile.size).toBe("FROM node:20\n".length);
  });

  it("should include every extension when the filter is empty", () => {
    expect(relativePaths(repo, { ...options, includeExts: new Set() })).toEqual([
      "Dockerfile",
      "notes.unknown",
      "src/a.ts",
      "src/b.md",
    ]);
  });

  it("should follow file symlinks but not directory symlinks", () => {
    symlinkSync(join(repo, "src/a.ts"), join(repo, "link.ts"));
    symlinkSync(join(repo, "src"), join(repo, "src-link"));

    expect(relativePaths(repo)).toEqual(["Dockerfile", "link.ts", "src/a.ts", "src/b.md"]);
  });

  it("should throw on iteration when the repository root cannot be read", () => {
    const missing = join(repo, "missing");
    expect(() => [...walkRepository(missing, options)]).toThrow();
  });
});

describe("walker helpers", () => {
  it("should exclude denylisted and dot directories", () => {
    const excluded = new Set(["node_modules"]);

    expect(shouldExcludeDir("node_modules", excluded)).toBe(true);
    expect(shouldExcludeDir(".cache", excluded)).toBe(true);
    expect(shouldExcludeDir("src", excluded)).toBe(false);
  });

  it("should match extensions case-insensitively and extensionless files by name", () => {
    const exts = new Set([".ts", "dockerfile"]);

    expect(matchesExtension("INDEX.TS", exts)).toBe(true);
    expect(matchesExtension("Dockerfile", exts)).toBe(true);
    expect(matchesExtension("main.go", exts)).toBe(false);
  });
});

describe("readTextFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
    writeTree(dir, {
      "ok.ts": "// TODO: ok\n",
      "nul.ts": Buffer.from([0x2f, 0x2f, 0x00, 0x41]),
      "latin1.ts": Buffer.from([0x2f, 0x2f, 0x20, 0xff, 0xfe, 0x41]),
    });
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("should return UTF-8 content", () => {
    expect(readTextFile(join(dir, "ok.ts"))).toBe("// TODO: ok\n");
  });

  it("should skip files with NUL bytes", () => {
    expect(readTextFile(join(dir, "nul.ts"))).toBeNull();
  });

  it("should skip files that are not valid UTF-8", () => {
    expect(readTextFile(join(dir, "latin1.ts"))).toBeNull();
  });

  it("should return null for a missing file", () => {
    expect(readTextFile(join(dir, "gone.ts"))).toBeNull();
  });
});
