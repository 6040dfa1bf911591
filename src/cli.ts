/**
 * Command line parsing.
 *
 *   nb [--source-directory DIR] [--config FILE] [--image REF] [--verbose]
 *      <dockerfile | build | release | deploy CLUSTER>
 */

import { UsageError } from "./errors.js";
import type { PipelineStage } from "./pipeline.js";

export const USAGE = `Usage: nb [options] <command>

Detect, build, release and deploy your application.

Commands:
  dockerfile        Detect build parameters and print your Dockerfile
  build             Build your project into a container image
  release           Build and push the image to the container registry
  deploy <cluster>  Release and deploy the image to a cluster

Options:
  -s, --source-directory <dir>  Root of the source code tree (default: ".")
  -c, --config <file>           Path to the configuration file (default: nb.toml)
  -i, --image <ref>             Use this image instead of building one
  -v, --verbose                 Print debug output
  -h, --help                    Print help
  -V, --version                 Print version`;

/** A parsed invocation that runs the pipeline. */
export interface RunCommand {
  kind: "run";
  stage: PipelineStage;
  sourceDirectory: string;
  config?: string;
  image?: string;
  cluster?: string;
  verbose: boolean;
}

export type Command = RunCommand | { kind: "help" } | { kind: "version" };

const STAGE_COMMANDS: readonly PipelineStage[] = [
  "dockerfile",
  "build",
  "release",
  "deploy",
];

function stageCommand(arg: string): PipelineStage | undefined {
  return STAGE_COMMANDS.find((stage) => stage === arg);
}

/**
 * Parses CLI arguments. Options may appear before or after the command.
 *
 * @throws UsageError on unknown or incomplete arguments
 */
export function parseCliArgs(argv: string[] = process.argv.slice(2)): Command {
  let sourceDirectory = ".";
  let config: string | undefined;
  let image: string | undefined;
  let verbose = false;
  let stage: PipelineStage | undefined;
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    function consumeValue(flag: string): string {
      i++;
      if (i >= argv.length || argv[i] === "") {
        throw new UsageError(`${flag} requires a value`);
      }
      return argv[i];
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { kind: "help" };
      case "-V":
      case "--version":
        return { kind: "version" };
      case "-s":
      case "--source-directory":
        sourceDirectory = consumeValue(arg);
        break;
      case "-c":
      case "--config":
        config = consumeValue(arg);
        break;
      case "-i":
      case "--image":
        image = consumeValue(arg);
        break;
      case "-v":
      case "--verbose":
        verbose = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`unknown argument: ${arg}`);
        }
        if (stage === undefined) {
          stage = stageCommand(arg);
          if (stage === undefined) {
            throw new UsageError(`unknown command: ${arg}`);
          }
        } else {
          positionals.push(arg);
        }
    }
  }

  if (stage === undefined) {
    throw new UsageError("a command is required");
  }

  let cluster: string | undefined;
  if (stage === "deploy") {
    if (positionals.length !== 1) {
      throw new UsageError("deploy requires exactly one cluster");
    }
    cluster = positionals[0];
  } else if (positionals.length > 0) {
    throw new UsageError(`unexpected argument: ${positionals[0]}`);
  }

  return {
    kind: "run",
    stage,
    sourceDirectory,
    config,
    image,
    cluster,
    verbose,
  };
}
