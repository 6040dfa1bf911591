/** Build ecosystems the detector knows about. */
export type SdkName = "go" | "rust" | "gradle" | "maven";

/** Container images an SDK builds in and ships on. */
export interface SdkImages {
  builderImage: string;
  runtimeImage: string;
}

export type SdkConfig = Record<SdkName, SdkImages>;

/**
 * A detected SDK, resolved against one source tree.
 *
 * Build targets are discovered once, when the variant is constructed, so
 * generating the Dockerfile does no further I/O.
 */
export interface SdkVariant {
  readonly name: SdkName;
  readonly rootPath: string;
  readonly builderImage: string;
  readonly runtimeImage: string;
  readonly buildTargets: readonly string[];
  dockerfile(): string;
}

/**
 * Detection and construction for one SDK.
 *
 * `probe` must be a cheap, read-only check. It resolves `false` when the
 * marker is absent and rejects only on unexpected filesystem errors.
 */
export interface SdkDefinition {
  readonly name: SdkName;
  probe(rootPath: string): Promise<boolean>;
  /** Discovers build targets; stable across runs on an unchanged tree. */
  listBuildTargets(rootPath: string): Promise<string[]>;
  describe(rootPath: string, images: SdkImages): Promise<SdkVariant>;
}
