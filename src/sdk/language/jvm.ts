import type { SdkName, SdkVariant } from "../types.js";

/** Where the builder stage leaves the application jar. */
const JAR_PATH = "/build/app.jar";

/**
 * Options describing how a JVM build tool runs inside the builder image.
 *
 * `phases` is the fixed target sequence; `jarDirectory` is where the tool
 * writes its artifacts relative to the source root, and `excludedJarSuffix`
 * filters out secondary jars (plain, sources) written next to the main one.
 */
export interface JvmBuildTool {
  name: SdkName;
  command: string;
  phases: readonly string[];
  jarDirectory: string;
  excludedJarSuffix: string;
}

/**
 * SDK for JVM build tools whose targets are a fixed phase sequence rather
 * than something discovered on disk.
 */
export class JvmSdk implements SdkVariant {
  readonly name: SdkName;
  readonly buildTargets: readonly string[];

  constructor(
    private readonly tool: JvmBuildTool,
    readonly rootPath: string,
    readonly builderImage: string,
    readonly runtimeImage: string,
  ) {
    this.name = tool.name;
    this.buildTargets = Object.freeze([...tool.phases]);
  }

  dockerfile(): string {
    const phaseCommands = this.buildTargets
      .map((phase) => `RUN ${this.tool.command} ${phase}`)
      .join("\n");

    const { jarDirectory, excludedJarSuffix } = this.tool;

    return `# Dockerfile generated by nb

#
# Builder image
#
FROM ${this.builderImage} AS builder
WORKDIR /src
COPY . /src

# Run build phases
${phaseCommands}

# Collect the application jar
RUN mkdir -p /build && cp "$(ls ${jarDirectory}/*.jar | grep -v -- '${excludedJarSuffix}$' | head -n 1)" ${JAR_PATH}

#
# Runtime image
#
FROM ${this.runtimeImage}
WORKDIR /app
COPY --from=builder ${JAR_PATH} /app/app.jar
CMD ["java", "-jar", "/app/app.jar"]
`;
  }
}
