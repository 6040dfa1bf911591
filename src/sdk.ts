import { SdkNotDetectedError } from "./errors.js";
import { debug } from "./log.js";
import { go } from "./sdk/language/go.js";
import { gradle } from "./sdk/language/gradle.js";
import { maven } from "./sdk/language/maven.js";
import { rust } from "./sdk/language/rust.js";
import type { SdkConfig, SdkDefinition, SdkVariant } from "./sdk/types.js";

/**
 * SDKs in detection priority order. The first one whose marker is found
 * wins; later entries are never probed.
 */
export const SDK_PRIORITY: readonly SdkDefinition[] = Object.freeze([
  go,
  rust,
  gradle,
  maven,
]);

/**
 * Detects the SDK for a source tree.
 *
 * @throws SdkNotDetectedError when no marker matches
 * @throws DetectionError when a probe hits an unexpected filesystem error
 */
export async function detectSdk(
  rootPath: string,
  config: SdkConfig,
  definitions: readonly SdkDefinition[] = SDK_PRIORITY,
): Promise<SdkVariant> {
  for (const definition of definitions) {
    debug(`Probing ${rootPath} for ${definition.name} SDK`);
    if (await definition.probe(rootPath)) {
      debug(`Detected ${definition.name} SDK`);
      return definition.describe(rootPath, config[definition.name]);
    }
  }

  throw new SdkNotDetectedError(rootPath);
}
