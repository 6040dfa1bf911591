import { InvalidImageReferenceError } from "./errors.js";

/**
 * Registry conventions an image can be released to.
 *
 * - `gar`: Google Artifact Registry, `{registry}/{team}/{app}:{tag}`
 * - `ghcr`: GitHub Container Registry, `{registry}/{app}:{tag}`
 */
export type ReleaseType = "gar" | "ghcr";

export const RELEASE_TYPES: readonly ReleaseType[] = ["gar", "ghcr"];

export interface ReleaseTarget {
  type: ReleaseType;
  registry: string;
}

export interface ImageReference {
  registry: string;
  team: string;
  app: string;
  tag: string;
}

function requireField(ref: ImageReference, field: keyof ImageReference): string {
  const value = ref[field];
  if (value === "") {
    throw new InvalidImageReferenceError(field);
  }
  return value;
}

/** Formats the fully qualified, tagged image name for a release target. */
export function formatImageName(type: ReleaseType, ref: ImageReference): string {
  const registry = requireField(ref, "registry");
  const app = requireField(ref, "app");
  const tag = requireField(ref, "tag");

  switch (type) {
    case "gar":
      return `${registry}/${requireField(ref, "team")}/${app}:${tag}`;
    case "ghcr":
      return `${registry}/${app}:${tag}`;
  }
}

/**
 * Returns the server part of a registry path, which is what `docker login`
 * and `docker logout` expect.
 *
 * `europe-north1-docker.pkg.dev/project/repo` → `europe-north1-docker.pkg.dev`
 */
export function registryHost(registry: string): string {
  const slash = registry.indexOf("/");
  return slash === -1 ? registry : registry.substring(0, slash);
}

// ---------------------------------------------------------------------------
// Tag generation
// ---------------------------------------------------------------------------

export interface SourceRevision {
  shortHash: string;
  dirty: boolean;
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Generates the default image tag, `<yyyymmdd>.<hhmmss>.<short hash>` in UTC.
 * A working tree with uncommitted changes gets a `-dirty` suffix.
 */
export function generateTag(now: Date, revision: SourceRevision): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const suffix = revision.dirty ? "-dirty" : "";
  return `${date}.${time}.${revision.shortHash}${suffix}`;
}
