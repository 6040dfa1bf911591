import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseToml } from "smol-toml";
import { ConfigurationError, describeCause } from "./errors.js";
import { RELEASE_TYPES } from "./image.js";
import type { ReleaseTarget, ReleaseType } from "./image.js";
import { debug } from "./log.js";
import type { SdkConfig, SdkImages, SdkName } from "./sdk/types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Built-in configuration shipped in the package root. */
export const DEFAULT_CONFIG_PATH = join(__dirname, "..", "default.toml");

/** Picked up from the source directory when `--config` is not given. */
export const CONFIG_FILE_NAME = "nb.toml";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReleaseConfig {
  type: ReleaseType;
  gar: { registry: string };
  ghcr: { registry: string };
}

export interface DeployConfig {
  tenant: string;
  /** Manifest path relative to the source directory; blank to auto-detect. */
  manifest: string;
}

export interface Config {
  team: string;
  app: string;
  sdk: SdkConfig;
  release: ReleaseConfig;
  deploy: DeployConfig;
}

type Table = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Merging
// ---------------------------------------------------------------------------

function isTable(value: unknown): value is Table {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

/** Merges `override` over `base`; nested tables merge, other values replace. */
export function mergeTables(base: Table, override: Table): Table {
  const result: Table = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] =
      isTable(current) && isTable(value) ? mergeTables(current, value) : value;
  }
  return result;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function table(doc: Table, path: string[]): Table {
  let current: Table = doc;
  for (let i = 0; i < path.length; i++) {
    const next = current[path[i]];
    if (!isTable(next)) {
      throw new ConfigurationError(
        `configuration: '${path.slice(0, i + 1).join(".")}' must be a table`,
      );
    }
    current = next;
  }
  return current;
}

function string(doc: Table, path: string[], key: string): string {
  const value = table(doc, path)[key];
  if (typeof value !== "string") {
    throw new ConfigurationError(
      `configuration: '${[...path, key].join(".")}' must be a string`,
    );
  }
  return value;
}

function releaseType(value: string): ReleaseType {
  const match = RELEASE_TYPES.find((type) => type === value);
  if (match === undefined) {
    throw new ConfigurationError(
      `configuration: unknown release type '${value}' (expected one of: ${RELEASE_TYPES.join(", ")})`,
    );
  }
  return match;
}

function sdkImages(doc: Table, name: SdkName): SdkImages {
  return {
    builderImage: string(doc, ["sdk", name], "build_docker_image"),
    runtimeImage: string(doc, ["sdk", name], "runtime_docker_image"),
  };
}

/** Validates a merged configuration document. */
export function parseConfig(doc: Table): Config {
  const config: Config = {
    team: string(doc, [], "team"),
    app: string(doc, [], "app"),
    sdk: {
      go: sdkImages(doc, "go"),
      rust: sdkImages(doc, "rust"),
      gradle: sdkImages(doc, "gradle"),
      maven: sdkImages(doc, "maven"),
    },
    release: {
      type: releaseType(string(doc, ["release"], "type")),
      gar: { registry: string(doc, ["release", "gar"], "registry") },
      ghcr: { registry: string(doc, ["release", "ghcr"], "registry") },
    },
    deploy: {
      tenant: string(doc, ["deploy", "nais"], "tenant"),
      manifest: string(doc, ["deploy", "nais"], "manifest"),
    },
  };

  const { type } = config.release;
  if (config.release[type].registry === "") {
    throw new ConfigurationError(
      `configuration: 'release.${type}.registry' is required when release type is '${type}'`,
    );
  }
  return config;
}

/** The registry images are released to under the active release type. */
export function releaseTarget(config: Config): ReleaseTarget {
  const { type } = config.release;
  return { type, registry: config.release[type].registry };
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

async function readToml(path: string): Promise<Table> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`read ${path}: ${describeCause(err)}`, {
      cause: err,
    });
  }

  try {
    return parseToml(content);
  } catch (err) {
    throw new ConfigurationError(
      `configuration file syntax error in ${path}: ${describeCause(err)}`,
      { cause: err },
    );
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (
      typeof err === "object" &&
      err !== null &&
      "code" in err &&
      err.code === "ENOENT"
    ) {
      debug(`No configuration file at ${path}`);
      return false;
    }
    throw new ConfigurationError(`read ${path}: ${describeCause(err)}`, {
      cause: err,
    });
  }
}

export interface LoadConfigOptions {
  sourceDirectory: string;
  /** Explicit configuration file; must exist when given. */
  configFile?: string;
  defaultConfigPath?: string;
}

/**
 * Loads the built-in defaults and merges the project's configuration file
 * over them. Without `configFile`, `nb.toml` in the source directory is
 * used when present.
 */
export async function loadConfig(options: LoadConfigOptions): Promise<Config> {
  const defaults = await readToml(options.defaultConfigPath ?? DEFAULT_CONFIG_PATH);

  let configFile = options.configFile;
  if (configFile === undefined) {
    const implicit = join(options.sourceDirectory, CONFIG_FILE_NAME);
    if (await isFile(implicit)) {
      configFile = implicit;
    }
  }

  if (configFile === undefined) {
    return parseConfig(defaults);
  }

  debug(`Reading configuration from ${configFile}`);
  return parseConfig(mergeTables(defaults, await readToml(configFile)));
}
