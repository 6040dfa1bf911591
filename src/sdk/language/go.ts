import { join } from "node:path";
import { listSubdirectories, markerExists } from "../probe.js";
import type {
  SdkDefinition,
  SdkImages,
  SdkVariant,
} from "../types.js";

/** Directory whose immediate subdirectories each hold one `main` package. */
export const GO_COMMAND_DIRECTORY = "cmd";

/**
 * Go module SDK.
 *
 * Detected by `go.mod` in the source root. Every directory under `./cmd`
 * becomes one binary in the runtime image. When there is exactly one
 * binary it becomes the image's default command.
 */
export class GoSdk implements SdkVariant {
  readonly name = "go";
  readonly buildTargets: readonly string[];

  constructor(
    readonly rootPath: string,
    readonly builderImage: string,
    readonly runtimeImage: string,
    buildTargets: string[],
  ) {
    this.buildTargets = Object.freeze([...buildTargets]);
  }

  dockerfile(): string {
    const buildCommands = this.buildTargets
      .map(
        (target) =>
          `RUN go build -a -installsuffix cgo -o /build/${target} ./${GO_COMMAND_DIRECTORY}/${target}`,
      )
      .join("\n");

    const copyCommands = this.buildTargets
      .map((target) => `COPY --from=builder /build/${target} /app/${target}`)
      .join("\n");

    const defaultCommand =
      this.buildTargets.length === 1
        ? `CMD ["/app/${this.buildTargets[0]}"]`
        : "# Default CMD omitted due to multiple targets specified";

    return `# Dockerfile generated by nb

#
# Builder image
#
FROM ${this.builderImage} AS builder
ENV GOOS=linux
ENV CGO_ENABLED=0
WORKDIR /src

# Download dependencies before copying the source code
COPY go.* /src/
RUN go mod download
COPY . /src

# Test all packages
RUN go test ./...

# Build all binaries found in ./${GO_COMMAND_DIRECTORY}/*
${buildCommands}

#
# Runtime image
#
FROM ${this.runtimeImage}
WORKDIR /app
${copyCommands}
${defaultCommand}
`;
  }
}

function listGoTargets(rootPath: string): Promise<string[]> {
  return listSubdirectories(join(rootPath, GO_COMMAND_DIRECTORY));
}

export const go: SdkDefinition = {
  name: "go",

  probe(rootPath: string): Promise<boolean> {
    return markerExists("go", rootPath, "go.mod");
  },

  listBuildTargets: listGoTargets,

  async describe(rootPath: string, images: SdkImages): Promise<SdkVariant> {
    return new GoSdk(
      rootPath,
      images.builderImage,
      images.runtimeImage,
      await listGoTargets(rootPath),
    );
  },
};
