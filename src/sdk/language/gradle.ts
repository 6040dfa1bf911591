import { anyMarkerExists, markerExists } from "../probe.js";
import type {
  SdkDefinition,
  SdkImages,
  SdkVariant,
} from "../types.js";
import { JvmSdk } from "./jvm.js";

export const GRADLE_MARKERS = ["gradlew", "build.gradle.kts", "build.gradle"];

export const GRADLE_PHASES = ["test", "build"] as const;

/**
 * Gradle SDK. Uses the project's wrapper script when one is checked in,
 * and the builder image's `gradle` otherwise.
 */
export const gradle: SdkDefinition = {
  name: "gradle",

  probe(rootPath: string): Promise<boolean> {
    return anyMarkerExists("gradle", rootPath, GRADLE_MARKERS);
  },

  async listBuildTargets(): Promise<string[]> {
    return [...GRADLE_PHASES];
  },

  async describe(rootPath: string, images: SdkImages): Promise<SdkVariant> {
    const wrapper = await markerExists("gradle", rootPath, "gradlew");
    return new JvmSdk(
      {
        name: "gradle",
        command: wrapper ? "./gradlew --no-daemon" : "gradle --no-daemon",
        phases: GRADLE_PHASES,
        jarDirectory: "build/libs",
        excludedJarSuffix: "-plain.jar",
      },
      rootPath,
      images.builderImage,
      images.runtimeImage,
    );
  },
};
