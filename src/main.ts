#!/usr/bin/env node

import * as core from "@actions/core";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { TokenProvider } from "./auth.js";
import { parseCliArgs, USAGE } from "./cli.js";
import type { RunCommand } from "./cli.js";
import { loadConfig } from "./config.js";
import { NaisDeployClient } from "./deploy.js";
import { DockerEngine } from "./docker.js";
import { Git } from "./git.js";
import { inGitHubActions, setVerbose } from "./log.js";
import { Pipeline } from "./pipeline.js";

function packageVersion(): string {
  const manifest: unknown = JSON.parse(
    readFileSync(join(__dirname, "..", "package.json"), "utf-8"),
  );
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "unknown";
}

async function execute(command: RunCommand): Promise<void> {
  setVerbose(command.verbose);

  const config = await loadConfig({
    sourceDirectory: command.sourceDirectory,
    configFile: command.config,
  });

  const pipeline = new Pipeline({
    engine: new DockerEngine(),
    versionControl: new Git(command.sourceDirectory),
    deployClient: new NaisDeployClient(),
    tokens: new TokenProvider(),
  });

  const result = await pipeline.run(command.stage, {
    sourceDirectory: command.sourceDirectory,
    config,
    imageOverride: command.image,
    cluster: command.cluster,
  });

  if (command.stage === "dockerfile" && result.dockerfile !== undefined) {
    process.stdout.write(result.dockerfile);
    process.stderr.write(`Will be built as: ${result.image}\n`);
  }
}

export async function run(argv: string[] = process.argv.slice(2)): Promise<void> {
  try {
    const command = parseCliArgs(argv);
    switch (command.kind) {
      case "help":
        process.stdout.write(`${USAGE}\n`);
        return;
      case "version":
        process.stdout.write(`nb ${packageVersion()}\n`);
        return;
      case "run":
        await execute(command);
        return;
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    if (inGitHubActions()) {
      core.setFailed(errorMessage);
    } else {
      process.stderr.write(`nb: ${errorMessage}\n`);
      process.exitCode = 1;
    }
  }
}

if (require.main === module) {
  void run();
}
