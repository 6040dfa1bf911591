import { normalizeBearerToken } from "./auth.js";
import { ConfigurationError } from "./errors.js";
import type { ReleaseTarget } from "./image.js";

/** Username Google Artifact Registry expects alongside an OAuth access token. */
export const GAR_USERNAME = "oauth2accesstoken";

export interface RegistryCredentials {
  username: string;
  password: string;
}

/** Anything that can hand out a registry bearer token. */
export interface RegistryTokenSource {
  acquireRegistryToken(): Promise<string>;
}

/**
 * Resolves login credentials for a release target.
 *
 * - `gar`: an access token from the token source, as `oauth2accesstoken`
 * - `ghcr`: `GITHUB_TOKEN` as `GITHUB_ACTOR`
 *
 * @throws ConfigurationError when GHCR credentials are missing from the
 *   environment
 */
export async function registryCredentials(
  target: ReleaseTarget,
  tokens: RegistryTokenSource,
  env: NodeJS.ProcessEnv = process.env,
): Promise<RegistryCredentials> {
  switch (target.type) {
    case "gar":
      return {
        username: GAR_USERNAME,
        password: normalizeBearerToken(await tokens.acquireRegistryToken()),
      };
    case "ghcr": {
      const username = env["GITHUB_ACTOR"];
      const token = env["GITHUB_TOKEN"];
      if (!username || !token) {
        throw new ConfigurationError(
          "release to ghcr requires GITHUB_ACTOR and GITHUB_TOKEN",
        );
      }
      return { username, password: normalizeBearerToken(token) };
    }
  }
}
