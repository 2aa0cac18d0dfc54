import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";

export function createTempDir(prefix: string = "todo-collector-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/**
 * "dir/" で終わるキーは空ディレクトリとして作る
 */
export function writeTree(root: string, files: Record<string, string | Uint8Array>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = join(root, relativePath);
    if (relativePath.endsWith("/")) {
      mkdirSync(fullPath, { recursive: true });
      continue;
    }
    mkdirSync(dirname(fullPath), { recursive: true });
    writeFileSync(fullPath, content);
  }
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * alpha / beta が対象、super は自分自身、plain は.git無し
 */
export function writeSampleWorkspace(root: string): void {
  writeTree(root, {
    "alpha/.git/": "",
    "alpha/src/index.ts": "const a = 1;\n// TODO: refactor this\n// FIXME(P0): crash on empty input\n",
    "alpha/node_modules/dep/index.js": "// TODO: vendored\n",
    "alpha/assets/blob.ts": Buffer.from([0x54, 0x4f, 0x44, 0x4f, 0x00, 0x3a, 0x20, 0x68, 0x69]),
    "beta/.git/": "",
    "beta/README.md": "# Beta\n\n- BUG: see reproductions of the crash\n",
    "super/.git/": "",
    "super/notes.md": "TODO: self\n",
    "plain/notes.txt": "TODO: ignored\n",
  });
}
