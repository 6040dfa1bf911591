import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { SdkConfig } from "../sdk/types.js";

export const SDK_IMAGES: SdkConfig = {
  go: { builderImage: "go-builder:1", runtimeImage: "go-runtime:1" },
  rust: { builderImage: "rust-builder:1", runtimeImage: "rust-runtime:1" },
  gradle: { builderImage: "gradle-builder:1", runtimeImage: "jre:1" },
  maven: { builderImage: "maven-builder:1", runtimeImage: "jre:1" },
};

/**
 * Creates a temporary source tree. Keys of `files` are relative paths;
 * `directories` are created empty.
 */
export function createSourceTree(
  files: Record<string, string>,
  directories: string[] = [],
): string {
  const root = mkdtempSync(join(tmpdir(), "nb-test-"));
  for (const directory of directories) {
    mkdirSync(join(root, directory), { recursive: true });
  }
  for (const [path, content] of Object.entries(files)) {
    mkdirSync(dirname(join(root, path)), { recursive: true });
    writeFileSync(join(root, path), content);
  }
  return root;
}

export function removeSourceTree(root: string): void {
  rmSync(root, { recursive: true, force: true });
}
