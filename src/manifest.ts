import type { Dirent } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigurationError, describeCause } from "./errors.js";
import { debug } from "./log.js";

/** File names recognized as an application manifest, in preference order. */
export const MANIFEST_CANDIDATES = [
  ".nais.yaml",
  ".nais.yml",
  ".naiserator.yaml",
  ".naiserator.yml",
  "nais.yaml",
  "nais.yml",
  "naiserator.yaml",
  "naiserator.yml",
  "dev.yaml",
  "dev.yml",
  "dev-gcp.yaml",
  "dev-gcp.yml",
  "dev-fss.yaml",
  "dev-fss.yml",
  "prod.yaml",
  "prod.yml",
  "prod-gcp.yaml",
  "prod-gcp.yml",
  "prod-fss.yaml",
  "prod-fss.yml",
];

/** The identity of the application a manifest deploys. */
export interface ManifestIdentity {
  team: string;
  app: string;
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

async function fileNames(path: string): Promise<Set<string>> {
  let entries: Dirent[];
  try {
    entries = await readdir(path, { withFileTypes: true });
  } catch (err) {
    if (isNotFound(err)) {
      return new Set<string>();
    }
    throw new ConfigurationError(`scan ${path}: ${describeCause(err)}`, {
      cause: err,
    });
  }
  return new Set(entries.filter((e) => e.isFile()).map((e) => e.name));
}

/**
 * Finds the application manifest in the source root or its `.nais`
 * directory. Root files win over `.nais` files; within a directory the
 * candidate order decides.
 */
export async function detectManifest(rootPath: string): Promise<string | undefined> {
  for (const directory of [rootPath, join(rootPath, ".nais")]) {
    const names = await fileNames(directory);
    const match = MANIFEST_CANDIDATES.find((candidate) => names.has(candidate));
    if (match !== undefined) {
      const path = join(directory, match);
      debug(`Using manifest ${path}`);
      return path;
    }
  }
  return undefined;
}

/** Reads `metadata.namespace` (team) and `metadata.name` (app) from a manifest. */
export function parseManifest(content: string, path: string): ManifestIdentity {
  let doc: unknown;
  try {
    doc = parseYaml(content);
  } catch (err) {
    throw new ConfigurationError(`parse ${path}: ${describeCause(err)}`, {
      cause: err,
    });
  }

  const metadata =
    typeof doc === "object" && doc !== null && "metadata" in doc
      ? doc.metadata
      : undefined;
  if (typeof metadata !== "object" || metadata === null) {
    throw new ConfigurationError(`${path}: manifest has no metadata`);
  }

  const team = "namespace" in metadata ? metadata.namespace : undefined;
  const app = "name" in metadata ? metadata.name : undefined;
  if (typeof team !== "string" || typeof app !== "string") {
    throw new ConfigurationError(
      `${path}: manifest metadata must contain 'name' and 'namespace'`,
    );
  }

  return { team, app };
}

export async function readManifest(path: string): Promise<ManifestIdentity> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`read ${path}: ${describeCause(err)}`, {
      cause: err,
    });
  }
  return parseManifest(content, path);
}
