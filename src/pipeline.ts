import { rmSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { releaseTarget } from "./config.js";
import type { Config } from "./config.js";
import { readDeployCredentials, validateDeployRequest } from "./deploy.js";
import type { DeployClient, DeployRequestDraft } from "./deploy.js";
import type { ContainerEngine } from "./docker.js";
import { ConfigurationError, describeCause } from "./errors.js";
import type { VersionControl } from "./git.js";
import { formatImageName, generateTag, registryHost } from "./image.js";
import type { ReleaseTarget } from "./image.js";
import { debug, info, warning } from "./log.js";
import { detectManifest, readManifest } from "./manifest.js";
import type { ManifestIdentity } from "./manifest.js";
import { registryCredentials } from "./registry.js";
import type { RegistryTokenSource } from "./registry.js";
import { detectSdk } from "./sdk.js";
import type { SdkConfig, SdkVariant } from "./sdk/types.js";

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

export type PipelineStage = "dockerfile" | "build" | "release" | "deploy";

/** Every stage, in execution order. */
export const PIPELINE_STAGES: readonly PipelineStage[] = [
  "dockerfile",
  "build",
  "release",
  "deploy",
];

/**
 * Returns the stages to run for a requested stage: every stage up to and
 * including it. With an image override, `release` and `deploy` skip
 * `dockerfile` and `build` and use the override as-is.
 */
export function planStages(
  requested: PipelineStage,
  hasImageOverride: boolean,
): PipelineStage[] {
  const stages = PIPELINE_STAGES.slice(0, PIPELINE_STAGES.indexOf(requested) + 1);
  if (!hasImageOverride || requested === "dockerfile" || requested === "build") {
    return stages;
  }
  return stages.filter((stage) => stage !== "dockerfile" && stage !== "build");
}

// ---------------------------------------------------------------------------
// Temporary Dockerfile
// ---------------------------------------------------------------------------

/** Signals that remove the temporary Dockerfile before the process ends. */
export const CLEANUP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Writes `content` to a Dockerfile in a fresh temporary directory, runs
 * `fn` with its path and removes the directory afterwards, whether `fn`
 * succeeded or not. A cleanup signal arriving meanwhile removes the
 * directory and is then raised again.
 */
export async function withTemporaryDockerfile<T>(
  content: string,
  fn: (path: string) => Promise<T>,
): Promise<T> {
  const directory = await mkdtemp(join(tmpdir(), "nb-"));
  const removeAndRaise = (signal: NodeJS.Signals): void => {
    rmSync(directory, { recursive: true, force: true });
    for (const other of CLEANUP_SIGNALS) {
      process.removeListener(other, removeAndRaise);
    }
    process.kill(process.pid, signal);
  };
  for (const signal of CLEANUP_SIGNALS) {
    process.once(signal, removeAndRaise);
  }

  try {
    const path = join(directory, "Dockerfile");
    await writeFile(path, content, "utf-8");
    return await fn(path);
  } finally {
    for (const signal of CLEANUP_SIGNALS) {
      process.removeListener(signal, removeAndRaise);
    }
    await rm(directory, { recursive: true, force: true });
  }
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export interface PipelineDependencies {
  engine: ContainerEngine;
  versionControl: VersionControl;
  deployClient: DeployClient;
  tokens: RegistryTokenSource;
  detect?: (rootPath: string, config: SdkConfig) => Promise<SdkVariant>;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
}

export interface PipelineOptions {
  sourceDirectory: string;
  config: Config;
  /** Precomputed image reference, used verbatim. */
  imageOverride?: string;
  /** Deploy target; required for the `deploy` stage. */
  cluster?: string;
}

export interface PipelineResult {
  stages: PipelineStage[];
  image: string;
  sdk?: SdkVariant;
  dockerfile?: string;
}

interface DeployPreflight {
  manifestPath: string;
  draft: DeployRequestDraft;
}

/**
 * Runs the build lifecycle up to a requested stage.
 *
 * Inputs every stage depends on (image name, SDK, deploy configuration) are
 * resolved before the first stage runs. Stages then run strictly in order
 * and the first failure aborts the rest; nothing is retried.
 */
export class Pipeline {
  private readonly detect: (rootPath: string, config: SdkConfig) => Promise<SdkVariant>;
  private readonly env: NodeJS.ProcessEnv;
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDependencies) {
    this.detect = deps.detect ?? detectSdk;
    this.env = deps.env ?? process.env;
    this.now = deps.now ?? (() => new Date());
  }

  async run(requested: PipelineStage, options: PipelineOptions): Promise<PipelineResult> {
    const { config, sourceDirectory } = options;
    const target = releaseTarget(config);
    const stages = planStages(requested, options.imageOverride !== undefined);
    const manifest = new ManifestResolver(sourceDirectory, config.deploy.manifest);

    const preflight = stages.includes("deploy")
      ? await this.deployPreflight(options, manifest)
      : undefined;
    const image = options.imageOverride ?? (await this.imageName(config, target, manifest));
    const sdk = stages.includes("dockerfile")
      ? await this.detect(sourceDirectory, config.sdk)
      : undefined;

    const result: PipelineResult = { stages, image, sdk };

    for (const stage of stages) {
      debug(`Running stage ${stage}`);
      switch (stage) {
        case "dockerfile":
          result.dockerfile = requireValue(sdk, "sdk").dockerfile();
          break;
        case "build":
          await this.build(requireValue(result.dockerfile, "dockerfile"), image, sourceDirectory);
          break;
        case "release":
          await this.release(image, target);
          break;
        case "deploy":
          await this.deploy(image, requireValue(preflight, "deploy preflight"));
          break;
      }
    }

    return result;
  }

  private async imageName(
    config: Config,
    target: ReleaseTarget,
    manifest: ManifestResolver,
  ): Promise<string> {
    let { team, app } = config;
    if (team === "" || app === "") {
      const identity = await manifest.identity();
      team = team === "" ? identity.team : team;
      app = app === "" ? identity.app : app;
    }

    const tag = generateTag(this.now(), await this.deps.versionControl.revision());
    return formatImageName(target.type, {
      registry: target.registry,
      team,
      app,
      tag,
    });
  }

  private async build(dockerfile: string, image: string, contextPath: string): Promise<void> {
    await withTemporaryDockerfile(dockerfile, (path) =>
      this.deps.engine.build(path, image, contextPath),
    );
    info(`Built ${image}`);
  }

  /**
   * Logs in, pushes, and always logs out again once logged in. A push
   * failure wins over a logout failure.
   */
  private async release(image: string, target: ReleaseTarget): Promise<void> {
    const { engine } = this.deps;
    const credentials = await registryCredentials(target, this.deps.tokens, this.env);
    const host = registryHost(target.registry);

    await engine.login(host, credentials.username, credentials.password);

    let pushFailure: { error: unknown } | undefined;
    try {
      await engine.push(image);
    } catch (error) {
      pushFailure = { error };
    }

    try {
      await engine.logout(host);
    } catch (error) {
      if (pushFailure === undefined) {
        throw error;
      }
      warning(`Logout from ${host} failed after a failed push: ${describeCause(error)}`);
    }

    if (pushFailure !== undefined) {
      throw pushFailure.error;
    }
    info(`Released ${image}`);
  }

  /** Checks the deploy configuration before any stage has run. */
  private async deployPreflight(
    options: PipelineOptions,
    manifest: ManifestResolver,
  ): Promise<DeployPreflight> {
    const credentials = readDeployCredentials(this.env, options.config.deploy.tenant);
    const manifestPath = await manifest.path();
    const missing: string[] = [];
    if (!credentials.apiKey) {
      missing.push("apiKey");
    }
    if (!credentials.deployServer) {
      missing.push("deployServer");
    }
    if (!options.cluster) {
      missing.push("cluster");
    }
    if (manifestPath === undefined) {
      missing.push("resources");
    }

    if (missing.length > 0 || manifestPath === undefined) {
      throw new ConfigurationError(
        `deploy configuration is incomplete; missing: ${missing.join(", ")}`,
      );
    }

    return {
      manifestPath,
      draft: { ...credentials, cluster: options.cluster },
    };
  }

  private async deploy(image: string, preflight: DeployPreflight): Promise<void> {
    const { versionControl, deployClient } = this.deps;
    const repository = await versionControl.repository();
    const ref = await versionControl.commitHash();

    const request = validateDeployRequest({
      ...preflight.draft,
      owner: repository.owner,
      repository: repository.name,
      ref,
      resources: [preflight.manifestPath],
      vars: { image },
      wait: true,
    });

    await deployClient.deploy(request);
    info(`Deployed ${image} to ${request.cluster}`);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Finds and reads the application manifest at most once per run. */
class ManifestResolver {
  private located: Promise<string | undefined> | undefined;

  constructor(
    private readonly sourceDirectory: string,
    private readonly configured: string,
  ) {}

  path(): Promise<string | undefined> {
    if (this.located === undefined) {
      this.located =
        this.configured !== ""
          ? Promise.resolve(join(this.sourceDirectory, this.configured))
          : detectManifest(this.sourceDirectory);
    }
    return this.located;
  }

  async identity(): Promise<ManifestIdentity> {
    const path = await this.path();
    if (path === undefined) {
      throw new ConfigurationError(
        "team and app are not configured and no application manifest was found",
      );
    }
    return readManifest(path);
  }
}

function requireValue<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new Error(`pipeline stage ran without its ${name}`);
  }
  return value;
}
