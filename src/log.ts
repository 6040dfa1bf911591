import * as core from "@actions/core";

let verbose = false;

/** Enables debug output outside of GitHub Actions. */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function inGitHubActions(): boolean {
  return process.env["GITHUB_ACTIONS"] === "true";
}

// Same escaping the runner expects for workflow command data.
function commandValue(message: string): string {
  return message
    .replace(/%/g, "%25")
    .replace(/\r/g, "%0D")
    .replace(/\n/g, "%0A");
}

/**
 * Debug output goes to stderr in every mode, so stdout stays free for the
 * generated Dockerfile. The runner reads workflow commands from both.
 */
export function debug(message: string): void {
  if (inGitHubActions()) {
    process.stderr.write(`::debug::${commandValue(message)}\n`);
  } else if (verbose || core.isDebug()) {
    process.stderr.write(`debug: ${message}\n`);
  }
}

export function info(message: string): void {
  core.info(message);
}

export function warning(message: string): void {
  core.warning(message);
}

/** Masks a credential in GitHub Actions logs. */
export function secret(value: string): void {
  if (value !== "" && inGitHubActions()) {
    core.setSecret(value);
  }
}
