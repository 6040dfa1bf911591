import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import {
  DetectionError,
  EmptyFilenameError,
  TargetDiscoveryError,
} from "../errors.js";
import type { SdkName } from "./types.js";

function errorCode(err: unknown): string | undefined {
  if (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    typeof err.code === "string"
  ) {
    return err.code;
  }
  return undefined;
}

/**
 * Reports whether `rootPath/marker` exists as a regular file.
 *
 * A missing path is "not applicable". Any other filesystem error, such as
 * EACCES, is raised as a DetectionError.
 */
export async function markerExists(
  sdk: SdkName,
  rootPath: string,
  marker: string,
): Promise<boolean> {
  const path = join(rootPath, marker);
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return false;
    }
    throw new DetectionError(sdk, path, err);
  }
}

/** Returns true when any of the markers exists, checked in order. */
export async function anyMarkerExists(
  sdk: SdkName,
  rootPath: string,
  markers: readonly string[],
): Promise<boolean> {
  for (const marker of markers) {
    if (await markerExists(sdk, rootPath, marker)) {
      return true;
    }
  }
  return false;
}

/**
 * Lists the immediate subdirectories of `path`, sorted.
 *
 * Directory iteration order is filesystem dependent, so the names are
 * sorted to keep generated Dockerfiles reproducible.
 */
export async function listSubdirectories(path: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(path, { withFileTypes: true });
  } catch (err) {
    throw new TargetDiscoveryError(path, err);
  }

  const names: string[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }
    // Undecodable names come back with U+FFFD replacement characters.
    if (entry.name === "" || entry.name.includes("\uFFFD")) {
      throw new EmptyFilenameError(path);
    }
    names.push(entry.name);
  }

  return names.sort();
}
