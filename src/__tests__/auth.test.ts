import { describe, expect, test } from "@jest/globals";
import {
  normalizeBearerToken,
  readFederationContext,
  STS_TOKEN_URL,
  TokenProvider,
} from "../auth.js";
import type {
  DefaultCredentials,
  FederationContext,
  HttpFetch,
  HttpRequest,
  HttpResponse,
} from "../auth.js";
import { TransportError } from "../errors.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ID_TOKEN_URL = "https://token.ci.example/idtoken?api-version=2.0";
const ID_TOKEN_ENDPOINT = "https://token.ci.example/idtoken";
const POOL = "projects/1/locations/global/workloadIdentityPools/ci/providers/gh";

const CONTEXT: FederationContext = {
  identityPool: POOL,
  oidcTokenUrl: ID_TOKEN_URL,
  oidcBearerToken: "test-request-token",
};

interface RecordedRequest {
  url: string;
  init: HttpRequest;
}

function response(status: number, body: string): HttpResponse {
  return { status, ok: status >= 200 && status < 300, text: async () => body };
}

/** Answers requests in order and records them. */
function scriptedFetch(responses: HttpResponse[]): {
  fetch: HttpFetch;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const fetch: HttpFetch = async (url, init) => {
    requests.push({ url, init });
    const next = responses.shift();
    if (next === undefined) {
      throw new Error(`unexpected request to ${url}`);
    }
    return next;
  };
  return { fetch, requests };
}

function staticCredentials(header: string): DefaultCredentials & { calls: number } {
  const credentials: DefaultCredentials & { calls: number } = {
    calls: 0,
    async authorizationHeader(): Promise<string> {
      credentials.calls++;
      return header;
    },
  };
  return credentials;
}

// ---------------------------------------------------------------------------
// Federation context
// ---------------------------------------------------------------------------

describe("readFederationContext", () => {
  const complete = {
    WORKLOAD_IDENTITY_POOL: POOL,
    ACTIONS_ID_TOKEN_REQUEST_URL: ID_TOKEN_URL,
    ACTIONS_ID_TOKEN_REQUEST_TOKEN: "test-request-token",
  };

  test("all three signals make a context", () => {
    expect(readFederationContext(complete)).toEqual(CONTEXT);
  });

  test.each([
    "WORKLOAD_IDENTITY_POOL",
    "ACTIONS_ID_TOKEN_REQUEST_URL",
    "ACTIONS_ID_TOKEN_REQUEST_TOKEN",
  ])("without %s there is no context", (name) => {
    expect(readFederationContext({ ...complete, [name]: "" })).toBeUndefined();
  });
});

describe("normalizeBearerToken", () => {
  test("strips a leading Bearer prefix", () => {
    expect(normalizeBearerToken("Bearer test-token")).toBe("test-token");
  });

  test("leaves a bare token alone", () => {
    expect(normalizeBearerToken("test-token")).toBe("test-token");
  });
});

// ---------------------------------------------------------------------------
// Token acquisition
// ---------------------------------------------------------------------------

describe("TokenProvider", () => {
  test("without a context only default credentials are used", async () => {
    const { fetch, requests } = scriptedFetch([]);
    const credentials = staticCredentials("Bearer test-access-token");
    const provider = new TokenProvider({ fetch, defaultCredentials: credentials });

    await expect(provider.acquireToken(undefined)).resolves.toBe(
      "test-access-token",
    );
    expect(credentials.calls).toBe(1);
    expect(requests).toHaveLength(0);
  });

  test("federation requests an identity token, then exchanges it", async () => {
    const { fetch, requests } = scriptedFetch([
      response(200, JSON.stringify({ value: "test-id-token" })),
      response(200, JSON.stringify({ access_token: "test-access-token" })),
    ]);
    const credentials = staticCredentials("Bearer unused");
    const provider = new TokenProvider({ fetch, defaultCredentials: credentials });

    await expect(provider.acquireToken(CONTEXT)).resolves.toBe(
      "test-access-token",
    );
    expect(credentials.calls).toBe(0);
    expect(requests).toHaveLength(2);

    const [identity, exchange] = requests;
    const identityUrl = new URL(identity.url);
    expect(identityUrl.searchParams.get("audience")).toBe(
      `https://iam.googleapis.com/${POOL}`,
    );
    expect(identityUrl.searchParams.get("api-version")).toBe("2.0");
    expect(identity.init.method).toBe("GET");
    expect(identity.init.headers).toEqual({
      Authorization: "Bearer test-request-token",
    });

    expect(exchange.url).toBe(STS_TOKEN_URL);
    expect(exchange.init.method).toBe("POST");
    expect(JSON.parse(exchange.init.body ?? "")).toEqual({
      grantType: "urn:ietf:params:oauth:grant-type:token-exchange",
      audience: `//iam.googleapis.com/${POOL}`,
      scope: "https://www.googleapis.com/auth/cloud-platform",
      requestedTokenType: "urn:ietf:params:oauth:token-type:access_token",
      subjectToken: "test-id-token",
      subjectTokenType: "urn:ietf:params:oauth:token-type:jwt",
    });
  });

  test("a body that is not JSON surfaces the status and body", async () => {
    const { fetch } = scriptedFetch([response(200, "<html>oops</html>")]);
    const provider = new TokenProvider({
      fetch,
      defaultCredentials: staticCredentials("unused"),
    });

    const err = await provider.acquireToken(CONTEXT).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      endpoint: ID_TOKEN_ENDPOINT,
      status: 200,
      body: "<html>oops</html>",
      message: `${ID_TOKEN_ENDPOINT}: response body is not valid JSON; code: 200, body: <html>oops</html>`,
    });
  });

  test("an exchange body that is not JSON surfaces the status and body", async () => {
    const { fetch } = scriptedFetch([
      response(200, JSON.stringify({ value: "test-id-token" })),
      response(200, "upstream unavailable"),
    ]);
    const provider = new TokenProvider({
      fetch,
      defaultCredentials: staticCredentials("unused"),
    });

    const err = await provider.acquireToken(CONTEXT).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      endpoint: STS_TOKEN_URL,
      status: 200,
      body: "upstream unavailable",
      message: `${STS_TOKEN_URL}: response body is not valid JSON; code: 200, body: upstream unavailable`,
    });
  });

  test("a rejected exchange carries the status and body", async () => {
    const { fetch } = scriptedFetch([
      response(200, JSON.stringify({ value: "test-id-token" })),
      response(403, '{"error":"access_denied"}'),
    ]);
    const provider = new TokenProvider({
      fetch,
      defaultCredentials: staticCredentials("unused"),
    });

    await expect(provider.acquireToken(CONTEXT)).rejects.toMatchObject({
      endpoint: STS_TOKEN_URL,
      status: 403,
      body: '{"error":"access_denied"}',
    });
  });

  test("a response without the expected field is a transport error", async () => {
    const { fetch } = scriptedFetch([response(200, '{"token":"x"}')]);
    const provider = new TokenProvider({
      fetch,
      defaultCredentials: staticCredentials("unused"),
    });

    await expect(provider.acquireToken(CONTEXT)).rejects.toThrow(
      `${ID_TOKEN_ENDPOINT}: response has no 'value' string; code: 200, body: {"token":"x"}`,
    );
  });

  test("a timed-out request names the timeout", async () => {
    const timeout = new Error("The operation was aborted due to timeout");
    timeout.name = "TimeoutError";
    const fetch: HttpFetch = async () => {
      throw timeout;
    };
    const provider = new TokenProvider({
      fetch,
      defaultCredentials: staticCredentials("unused"),
      timeoutMs: 3000,
    });

    await expect(provider.acquireToken(CONTEXT)).rejects.toThrow(
      `${ID_TOKEN_ENDPOINT}: request timed out after 3000 ms`,
    );
  });

  test("every request carries an abort signal", async () => {
    const { fetch, requests } = scriptedFetch([
      response(200, JSON.stringify({ value: "test-id-token" })),
      response(200, JSON.stringify({ access_token: "test-access-token" })),
    ]);
    const provider = new TokenProvider({
      fetch,
      defaultCredentials: staticCredentials("unused"),
    });

    await provider.acquireToken(CONTEXT);
    for (const request of requests) {
      expect(request.init.signal).toBeInstanceOf(AbortSignal);
    }
  });

  test("the environment decides which path is taken", async () => {
    const { fetch, requests } = scriptedFetch([
      response(200, JSON.stringify({ value: "test-id-token" })),
      response(200, JSON.stringify({ access_token: "test-access-token" })),
    ]);
    const provider = new TokenProvider({
      fetch,
      defaultCredentials: staticCredentials("unused"),
      env: {
        WORKLOAD_IDENTITY_POOL: POOL,
        ACTIONS_ID_TOKEN_REQUEST_URL: ID_TOKEN_URL,
        ACTIONS_ID_TOKEN_REQUEST_TOKEN: "test-request-token",
      },
    });

    await expect(provider.acquireRegistryToken()).resolves.toBe("test-access-token");
    expect(requests).toHaveLength(2);
  });

  test("a partial federation environment falls back to default credentials", async () => {
    const { fetch, requests } = scriptedFetch([]);
    const provider = new TokenProvider({
      fetch,
      defaultCredentials: staticCredentials("test-access-token"),
      env: { WORKLOAD_IDENTITY_POOL: POOL },
    });

    await expect(provider.acquireRegistryToken()).resolves.toBe("test-access-token");
    expect(requests).toHaveLength(0);
  });

  test("a default credentials failure is a transport error", async () => {
    const provider = new TokenProvider({
      fetch: scriptedFetch([]).fetch,
      defaultCredentials: {
        authorizationHeader: async () => {
          throw new Error("could not load the default credentials");
        },
      },
    });

    const err = await provider.acquireToken(undefined).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({
      endpoint: "application default credentials",
      message:
        "application default credentials: could not load the default credentials",
    });
  });
});
