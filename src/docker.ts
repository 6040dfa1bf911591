import { run } from "./exec.js";
import { debug } from "./log.js";

/** The container engine operations the pipeline drives. */
export interface ContainerEngine {
  build(dockerfilePath: string, tag: string, contextPath: string): Promise<void>;
  login(registry: string, username: string, password: string): Promise<void>;
  logout(registry: string): Promise<void>;
  push(image: string): Promise<void>;
}

/**
 * `docker` CLI. Output is streamed through; a non-zero exit status is
 * raised as a ProcessError carrying the status.
 */
export class DockerEngine implements ContainerEngine {
  constructor(private readonly command: string = "docker") {}

  async build(dockerfilePath: string, tag: string, contextPath: string): Promise<void> {
    debug(`Building image ${tag} from ${contextPath}`);
    await run(this.command, "build", [
      "build",
      "--file",
      dockerfilePath,
      "--tag",
      tag,
      contextPath,
    ]);
  }

  /** Logs in with the password on standard input, never on the command line. */
  async login(registry: string, username: string, password: string): Promise<void> {
    debug(`Logging in to registry ${registry}`);
    await run(
      this.command,
      "login",
      ["login", registry, "--username", username, "--password-stdin"],
      { input: password },
    );
  }

  async logout(registry: string): Promise<void> {
    debug(`Logging out of registry ${registry}`);
    await run(this.command, "logout", ["logout", registry]);
  }

  async push(image: string): Promise<void> {
    debug(`Pushing image ${image}`);
    await run(this.command, "push", ["push", image]);
  }
}
