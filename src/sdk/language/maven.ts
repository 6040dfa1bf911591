import { markerExists } from "../probe.js";
import type {
  SdkDefinition,
  SdkImages,
  SdkVariant,
} from "../types.js";
import { JvmSdk } from "./jvm.js";

export const MAVEN_PHASES = ["test", "package"] as const;

/** Maven SDK, detected by `pom.xml` in the source root. */
export const maven: SdkDefinition = {
  name: "maven",

  probe(rootPath: string): Promise<boolean> {
    return markerExists("maven", rootPath, "pom.xml");
  },

  async listBuildTargets(): Promise<string[]> {
    return [...MAVEN_PHASES];
  },

  async describe(rootPath: string, images: SdkImages): Promise<SdkVariant> {
    return new JvmSdk(
      {
        name: "maven",
        command: "mvn --batch-mode",
        phases: MAVEN_PHASES,
        jarDirectory: "target",
        excludedJarSuffix: "-sources.jar",
      },
      rootPath,
      images.builderImage,
      images.runtimeImage,
    );
  },
};
