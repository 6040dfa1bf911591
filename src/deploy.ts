import { ConfigurationError } from "./errors.js";
import { run } from "./exec.js";
import { debug, secret } from "./log.js";

export const DEPLOY_ENV = {
  apiKey: "NAIS_DEPLOY_APIKEY",
  deployServer: "NAIS_DEPLOY_SERVER",
} as const;

/** A complete request to the deploy client. */
export interface DeployRequest {
  apiKey: string;
  deployServer: string;
  cluster: string;
  owner: string;
  repository: string;
  ref: string;
  resources: string[];
  vars: Record<string, string>;
  wait: boolean;
}

export type DeployRequestDraft = {
  [K in keyof DeployRequest]?: DeployRequest[K];
};

const REQUIRED_FIELDS = [
  "apiKey",
  "deployServer",
  "cluster",
  "owner",
  "repository",
  "ref",
] as const;

/** Deploy server for a tenant, used when none is configured explicitly. */
export function tenantDeployServer(tenant: string): string {
  return `deploy.${tenant}.cloud.nais.io:443`;
}

/**
 * Reads the deploy credentials from the environment. The server falls back
 * to the tenant's well-known address.
 */
export function readDeployCredentials(
  env: NodeJS.ProcessEnv,
  tenant: string,
): Pick<DeployRequestDraft, "apiKey" | "deployServer"> {
  const apiKey = env[DEPLOY_ENV.apiKey] || undefined;
  const deployServer =
    env[DEPLOY_ENV.deployServer] ||
    (tenant !== "" ? tenantDeployServer(tenant) : undefined);
  return { apiKey, deployServer };
}

/**
 * Checks that a draft has every field the deploy client needs.
 *
 * @throws ConfigurationError naming every missing field
 */
export function validateDeployRequest(draft: DeployRequestDraft): DeployRequest {
  const missing: string[] = REQUIRED_FIELDS.filter((field) => !draft[field]);
  const resources = draft.resources ?? [];
  if (resources.length === 0) {
    missing.push("resources");
  }

  if (
    missing.length > 0 ||
    !draft.apiKey ||
    !draft.deployServer ||
    !draft.cluster ||
    !draft.owner ||
    !draft.repository ||
    !draft.ref
  ) {
    throw new ConfigurationError(
      `deploy configuration is incomplete; missing: ${missing.join(", ")}`,
    );
  }

  return {
    apiKey: draft.apiKey,
    deployServer: draft.deployServer,
    cluster: draft.cluster,
    owner: draft.owner,
    repository: draft.repository,
    ref: draft.ref,
    resources,
    vars: draft.vars ?? {},
    wait: draft.wait ?? true,
  };
}

/** Command line for the deploy client. The API key is not part of it. */
export function deployArguments(request: DeployRequest): string[] {
  const args: string[] = [];
  for (const resource of request.resources) {
    args.push("--resource", resource);
  }
  for (const [key, value] of Object.entries(request.vars)) {
    args.push("--var", `${key}=${value}`);
  }
  args.push(
    "--cluster",
    request.cluster,
    "--deploy-server",
    request.deployServer,
    "--owner",
    request.owner,
    "--repository",
    request.repository,
    "--ref",
    request.ref,
    "--wait",
    String(request.wait),
  );
  return args;
}

export interface DeployClient {
  deploy(request: DeployRequest): Promise<void>;
}

/** The external `deploy` command. */
export class NaisDeployClient implements DeployClient {
  constructor(private readonly command: string = "deploy") {}

  async deploy(request: DeployRequest): Promise<void> {
    debug(`Deploying ${request.repository} to ${request.cluster}`);
    secret(request.apiKey);
    await run(this.command, "deploy", deployArguments(request), {
      env: { APIKEY: request.apiKey },
    });
  }
}
