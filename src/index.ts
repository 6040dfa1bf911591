// Public API re-exports for nb-cli

// Errors
export {
  NbError,
  SdkNotDetectedError,
  DetectionError,
  TargetDiscoveryError,
  EmptyFilenameError,
  TransportError,
  ProcessError,
  ConfigurationError,
  InvalidImageReferenceError,
  UsageError,
} from "./errors.js";
export type { ErrorKind } from "./errors.js";

// SDK detection
export { SDK_PRIORITY, detectSdk } from "./sdk.js";
export { GoSdk, go } from "./sdk/language/go.js";
export { RustSdk, rust, parseCargo } from "./sdk/language/rust.js";
export { JvmSdk } from "./sdk/language/jvm.js";
export type { JvmBuildTool } from "./sdk/language/jvm.js";
export { gradle } from "./sdk/language/gradle.js";
export { maven } from "./sdk/language/maven.js";
export type {
  SdkConfig,
  SdkDefinition,
  SdkImages,
  SdkName,
  SdkVariant,
} from "./sdk/types.js";

// Images and registries
export { formatImageName, generateTag, registryHost } from "./image.js";
export type {
  ImageReference,
  ReleaseTarget,
  ReleaseType,
  SourceRevision,
} from "./image.js";
export { GAR_USERNAME, registryCredentials } from "./registry.js";
export type { RegistryCredentials, RegistryTokenSource } from "./registry.js";
export {
  GoogleDefaultCredentials,
  TokenProvider,
  normalizeBearerToken,
  readFederationContext,
} from "./auth.js";
export type { FederationContext, HttpFetch } from "./auth.js";

// Configuration
export { loadConfig, parseConfig, releaseTarget } from "./config.js";
export type { Config } from "./config.js";
export { detectManifest, readManifest } from "./manifest.js";

// External tools
export { DockerEngine } from "./docker.js";
export type { ContainerEngine } from "./docker.js";
export { Git } from "./git.js";
export type { Repository, VersionControl } from "./git.js";
export { NaisDeployClient, deployArguments, validateDeployRequest } from "./deploy.js";
export type { DeployClient, DeployRequest } from "./deploy.js";

// Pipeline
export { Pipeline, planStages } from "./pipeline.js";
export type { PipelineResult, PipelineStage } from "./pipeline.js";

// CLI
export { parseCliArgs } from "./cli.js";
export type { Command, RunCommand } from "./cli.js";
