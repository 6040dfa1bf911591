import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse as parseToml } from "smol-toml";
import { TargetDiscoveryError } from "../../errors.js";
import { markerExists } from "../probe.js";
import type {
  SdkDefinition,
  SdkImages,
  SdkVariant,
} from "../types.js";

// ---------------------------------------------------------------------------
// Cargo.toml parsing
// ---------------------------------------------------------------------------

/** Minimal representation of a Cargo.toml file. */
interface CargoToml {
  bins: string[];
  packageName?: string;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extracts the fields target discovery needs:
 *   - `[package]` name
 *   - `[[bin]]` names
 */
export function parseCargo(content: string): CargoToml {
  const doc = parseToml(content);
  const result: CargoToml = { bins: [] };

  if (isTable(doc.package) && typeof doc.package.name === "string") {
    result.packageName = doc.package.name;
  }

  if (Array.isArray(doc.bin)) {
    for (const entry of doc.bin) {
      if (isTable(entry) && typeof entry.name === "string") {
        result.bins.push(entry.name);
      }
    }
  }

  return result;
}

/**
 * Binary names built by a crate: every `[[bin]]` entry, or the package
 * name when the manifest declares none.
 */
export async function listRustTargets(rootPath: string): Promise<string[]> {
  const path = join(rootPath, "Cargo.toml");

  let cargo: CargoToml;
  try {
    cargo = parseCargo(await readFile(path, "utf-8"));
  } catch (err) {
    throw new TargetDiscoveryError(path, err);
  }

  const names =
    cargo.bins.length > 0
      ? cargo.bins
      : cargo.packageName !== undefined
        ? [cargo.packageName]
        : [];

  return [...new Set(names)].sort();
}

// ---------------------------------------------------------------------------
// RustSdk
// ---------------------------------------------------------------------------

export class RustSdk implements SdkVariant {
  readonly name = "rust";
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
      .map((target) => `RUN cargo build --release --bin ${target}`)
      .join("\n");

    const copyCommands = this.buildTargets
      .map(
        (target) =>
          `COPY --from=builder /src/target/release/${target} /app/${target}`,
      )
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
RUN apk add --no-cache musl-dev
WORKDIR /src
COPY . /src

# Test the workspace
RUN cargo test --release

# Build all binaries declared in Cargo.toml
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

export const rust: SdkDefinition = {
  name: "rust",

  probe(rootPath: string): Promise<boolean> {
    return markerExists("rust", rootPath, "Cargo.toml");
  },

  listBuildTargets: listRustTargets,

  async describe(rootPath: string, images: SdkImages): Promise<SdkVariant> {
    return new RustSdk(
      rootPath,
      images.builderImage,
      images.runtimeImage,
      await listRustTargets(rootPath),
    );
  },
};
