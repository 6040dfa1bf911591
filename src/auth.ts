import { GoogleAuth } from "google-auth-library";
import { TransportError, describeCause } from "./errors.js";
import { debug, secret } from "./log.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const FEDERATION_ENV = {
  identityPool: "WORKLOAD_IDENTITY_POOL",
  oidcTokenUrl: "ACTIONS_ID_TOKEN_REQUEST_URL",
  oidcBearerToken: "ACTIONS_ID_TOKEN_REQUEST_TOKEN",
} as const;

export const STS_TOKEN_URL = "https://sts.googleapis.com/v1/token";
export const CLOUD_PLATFORM_SCOPE = "https://www.googleapis.com/auth/cloud-platform";
export const DEFAULT_CREDENTIALS_AUDIENCE = "https://oauth2.googleapis.com/token/";
export const HTTP_TIMEOUT_MS = 3000;

const GRANT_TYPE_TOKEN_EXCHANGE = "urn:ietf:params:oauth:grant-type:token-exchange";
const TOKEN_TYPE_ACCESS_TOKEN = "urn:ietf:params:oauth:token-type:access_token";
const TOKEN_TYPE_JWT = "urn:ietf:params:oauth:token-type:jwt";

// ---------------------------------------------------------------------------
// Federation context
// ---------------------------------------------------------------------------

/**
 * Ambient signals of a CI identity. Only exists when all three are set; a
 * partial set means the default-credentials path is used instead.
 */
export interface FederationContext {
  readonly identityPool: string;
  readonly oidcTokenUrl: string;
  readonly oidcBearerToken: string;
}

/** The single read of the process environment done by token acquisition. */
export function readFederationContext(
  env: NodeJS.ProcessEnv = process.env,
): FederationContext | undefined {
  const identityPool = env[FEDERATION_ENV.identityPool];
  const oidcTokenUrl = env[FEDERATION_ENV.oidcTokenUrl];
  const oidcBearerToken = env[FEDERATION_ENV.oidcBearerToken];

  if (!identityPool || !oidcTokenUrl || !oidcBearerToken) {
    return undefined;
  }

  return Object.freeze({ identityPool, oidcTokenUrl, oidcBearerToken });
}

/** Strips a leading `Bearer ` from a token, or returns it as-is. */
export function normalizeBearerToken(token: string): string {
  const prefix = "Bearer ";
  return token.startsWith(prefix) ? token.substring(prefix.length) : token;
}

// ---------------------------------------------------------------------------
// Transport seams
// ---------------------------------------------------------------------------

export interface HttpRequest {
  method: "GET" | "POST";
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  text(): Promise<string>;
}

/** The subset of `fetch` used for token requests. */
export type HttpFetch = (url: string, init: HttpRequest) => Promise<HttpResponse>;

/** Host-provided credentials, used when no CI identity is available. */
export interface DefaultCredentials {
  /** Returns the `Authorization` header value for the configured scope. */
  authorizationHeader(): Promise<string>;
}

/** Application default credentials: a service-account file or attached identity. */
export class GoogleDefaultCredentials implements DefaultCredentials {
  private readonly auth = new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] });

  async authorizationHeader(): Promise<string> {
    const headers = await this.auth.getRequestHeaders(
      DEFAULT_CREDENTIALS_AUDIENCE,
    );
    const value: string | undefined =
      headers["Authorization"] ?? headers["authorization"];
    if (value === undefined) {
      throw new Error("credentials did not produce an Authorization header");
    }
    return value;
  }
}

// ---------------------------------------------------------------------------
// TokenProvider
// ---------------------------------------------------------------------------

export interface TokenProviderOptions {
  fetch?: HttpFetch;
  defaultCredentials?: DefaultCredentials;
  timeoutMs?: number;
  /** Where the federation signals are read from. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Acquires a bearer token for the container registry.
 *
 * With a federation context the CI identity token is exchanged for a
 * short-lived access token (two HTTP calls, 3 seconds each). Without one,
 * application default credentials are used. Nothing is retried or cached.
 */
export class TokenProvider {
  private readonly fetch: HttpFetch;
  private readonly defaultCredentials: DefaultCredentials;
  private readonly timeoutMs: number;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: TokenProviderOptions = {}) {
    this.fetch = options.fetch ?? fetch;
    this.defaultCredentials =
      options.defaultCredentials ?? new GoogleDefaultCredentials();
    this.timeoutMs = options.timeoutMs ?? HTTP_TIMEOUT_MS;
    this.env = options.env ?? process.env;
  }

  acquireRegistryToken(): Promise<string> {
    return this.acquireToken(readFederationContext(this.env));
  }

  /** Uses federation when a context is given, default credentials otherwise. */
  async acquireToken(context: FederationContext | undefined): Promise<string> {
    const token =
      context === undefined
        ? await this.defaultCredentialsToken()
        : await this.federatedToken(context);
    secret(token);
    return token;
  }

  async federatedToken(context: FederationContext): Promise<string> {
    const idToken = await this.requestIdentityToken(context);
    secret(idToken);
    return this.exchangeFederatedToken(context.identityPool, idToken);
  }

  /** Fetches a CI identity token whose audience is the identity pool. */
  async requestIdentityToken(context: FederationContext): Promise<string> {
    debug("Requesting identity token from CI provider");

    let url: URL;
    try {
      url = new URL(context.oidcTokenUrl);
    } catch (err) {
      throw new TransportError(
        context.oidcTokenUrl,
        `invalid token request URL: ${describeCause(err)}`,
        undefined,
        undefined,
        { cause: err },
      );
    }
    url.searchParams.set(
      "audience",
      `https://iam.googleapis.com/${context.identityPool}`,
    );

    const endpoint = `${url.origin}${url.pathname}`;
    const body = await this.requestJson(endpoint, url.toString(), {
      method: "GET",
      headers: { Authorization: `Bearer ${context.oidcBearerToken}` },
    });

    return readStringField(body, "value", endpoint);
  }

  /** Exchanges a CI identity token for an access token with the STS. */
  async exchangeFederatedToken(
    identityPool: string,
    identityToken: string,
  ): Promise<string> {
    debug("Exchanging federated identity token for an access token");

    const body = await this.requestJson(STS_TOKEN_URL, STS_TOKEN_URL, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        grantType: GRANT_TYPE_TOKEN_EXCHANGE,
        audience: `//iam.googleapis.com/${identityPool}`,
        scope: CLOUD_PLATFORM_SCOPE,
        requestedTokenType: TOKEN_TYPE_ACCESS_TOKEN,
        subjectToken: identityToken,
        subjectTokenType: TOKEN_TYPE_JWT,
      }),
    });

    return readStringField(body, "access_token", STS_TOKEN_URL);
  }

  async defaultCredentialsToken(): Promise<string> {
    debug("Exchanging application default credentials for an access token");

    let header: string;
    try {
      header = await this.defaultCredentials.authorizationHeader();
    } catch (err) {
      throw new TransportError(
        "application default credentials",
        describeCause(err),
        undefined,
        undefined,
        { cause: err },
      );
    }
    return normalizeBearerToken(header);
  }

  private async requestJson(
    endpoint: string,
    url: string,
    init: Omit<HttpRequest, "signal">,
  ): Promise<JsonBody> {
    let response: HttpResponse;
    try {
      response = await this.fetch(url, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const reason = isTimeout(err)
        ? `request timed out after ${this.timeoutMs} ms`
        : `request failed: ${describeCause(err)}`;
      throw new TransportError(endpoint, reason, undefined, undefined, {
        cause: err,
      });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw new TransportError(
        endpoint,
        `read response body: ${describeCause(err)}`,
        response.status,
        undefined,
        { cause: err },
      );
    }

    if (!response.ok) {
      throw new TransportError(endpoint, "unexpected status", response.status, text);
    }

    try {
      return { status: response.status, text, json: JSON.parse(text) };
    } catch (err) {
      throw new TransportError(
        endpoint,
        "response body is not valid JSON",
        response.status,
        text,
        { cause: err },
      );
    }
  }
}

interface JsonBody {
  status: number;
  text: string;
  json: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringField(body: JsonBody, field: string, endpoint: string): string {
  const value = isRecord(body.json) ? body.json[field] : undefined;
  if (typeof value === "string" && value !== "") {
    return value;
  }
  throw new TransportError(
    endpoint,
    `response has no '${field}' string`,
    body.status,
    body.text,
  );
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}
