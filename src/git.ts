import { ConfigurationError } from "./errors.js";
import { output } from "./exec.js";
import type { SourceRevision } from "./image.js";

export interface Repository {
  owner: string;
  name: string;
}

/** Version-control metadata the pipeline reads. */
export interface VersionControl {
  revision(): Promise<SourceRevision>;
  commitHash(): Promise<string>;
  repository(): Promise<Repository>;
}

/**
 * Parses `owner/name` out of a remote URL. Accepts the scp-like SSH form
 * (`git@host:owner/name.git`) and URL forms (`https://host/owner/name`).
 */
export function parseRepositoryUrl(url: string): Repository | undefined {
  const trimmed = url.trim().replace(/\.git$/, "").replace(/\/+$/, "");

  let path: string;
  const scp = /^[^@/]+@[^:/]+:(.+)$/.exec(trimmed);
  if (scp !== null) {
    path = scp[1];
  } else {
    try {
      path = new URL(trimmed).pathname.replace(/^\/+/, "");
    } catch {
      return undefined;
    }
  }

  const parts = path.split("/");
  if (parts.length < 2) {
    return undefined;
  }
  const name = parts[parts.length - 1];
  const owner = parts[parts.length - 2];
  if (owner === "" || name === "") {
    return undefined;
  }
  return { owner, name };
}

/** Parses the `owner/name` form GitHub Actions puts in GITHUB_REPOSITORY. */
export function parseRepositorySlug(slug: string): Repository | undefined {
  const [owner, name, ...rest] = slug.split("/");
  if (!owner || !name || rest.length > 0) {
    return undefined;
  }
  return { owner, name };
}

/**
 * The `git` CLI, run inside the source directory. GitHub Actions
 * environment variables take precedence where they carry the same facts.
 */
export class Git implements VersionControl {
  constructor(
    private readonly rootPath: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly command: string = "git",
  ) {}

  async revision(): Promise<SourceRevision> {
    const shortHash = await output(
      this.command,
      "rev-parse",
      ["rev-parse", "--short", "HEAD"],
      { cwd: this.rootPath },
    );
    const status = await output(
      this.command,
      "status",
      ["status", "--porcelain"],
      { cwd: this.rootPath },
    );
    return { shortHash, dirty: status !== "" };
  }

  async commitHash(): Promise<string> {
    const sha = this.env["GITHUB_SHA"];
    if (sha) {
      return sha;
    }
    return output(this.command, "rev-parse", ["rev-parse", "HEAD"], {
      cwd: this.rootPath,
    });
  }

  async repository(): Promise<Repository> {
    const slug = this.env["GITHUB_REPOSITORY"];
    if (slug) {
      const repository = parseRepositorySlug(slug);
      if (repository === undefined) {
        throw new ConfigurationError(
          `GITHUB_REPOSITORY is not in owner/name form: ${slug}`,
        );
      }
      return repository;
    }

    const url = await output(
      this.command,
      "remote",
      ["remote", "get-url", "origin"],
      { cwd: this.rootPath },
    );
    const repository = parseRepositoryUrl(url);
    if (repository === undefined) {
      throw new ConfigurationError(
        `repository owner and name could not be read from remote URL: ${url}`,
      );
    }
    return repository;
  }
}
