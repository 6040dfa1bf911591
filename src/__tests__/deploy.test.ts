import { describe, expect, test } from "@jest/globals";
import {
  deployArguments,
  readDeployCredentials,
  tenantDeployServer,
  validateDeployRequest,
} from "../deploy.js";
import type { DeployRequest } from "../deploy.js";
import { ConfigurationError } from "../errors.js";

const REQUEST: DeployRequest = {
  apiKey: "test-secret",
  deployServer: "deploy.example:443",
  cluster: "dev-gcp",
  owner: "acme",
  repository: "svc",
  ref: "0123456789abcdef",
  resources: [".nais/dev.yaml"],
  vars: { image: "r/t/a:1" },
  wait: true,
};

// ---------------------------------------------------------------------------
// Credentials
// ---------------------------------------------------------------------------

describe("readDeployCredentials", () => {
  test("reads the API key and server from the environment", () => {
    expect(
      readDeployCredentials(
        { NAIS_DEPLOY_APIKEY: "test-secret", NAIS_DEPLOY_SERVER: "deploy.example:443" },
        "acme",
      ),
    ).toEqual({ apiKey: "test-secret", deployServer: "deploy.example:443" });
  });

  test("the server falls back to the tenant's address", () => {
    expect(readDeployCredentials({}, "acme")).toEqual({
      apiKey: undefined,
      deployServer: tenantDeployServer("acme"),
    });
    expect(tenantDeployServer("acme")).toBe("deploy.acme.cloud.nais.io:443");
  });

  test("without a tenant there is no server", () => {
    expect(readDeployCredentials({}, "").deployServer).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("validateDeployRequest", () => {
  test("a complete draft passes", () => {
    expect(validateDeployRequest(REQUEST)).toEqual(REQUEST);
  });

  test("wait defaults to true and vars to empty", () => {
    const { wait: _wait, vars: _vars, ...draft } = REQUEST;
    const request = validateDeployRequest(draft);
    expect(request.wait).toBe(true);
    expect(request.vars).toEqual({});
  });

  test("every missing field is named", () => {
    expect(() =>
      validateDeployRequest({ ...REQUEST, apiKey: "", cluster: undefined, resources: [] }),
    ).toThrow(
      new ConfigurationError(
        "deploy configuration is incomplete; missing: apiKey, cluster, resources",
      ),
    );
  });
});

// ---------------------------------------------------------------------------
// Arguments
// ---------------------------------------------------------------------------

describe("deployArguments", () => {
  test("passes resources, vars and the target", () => {
    expect(deployArguments(REQUEST)).toEqual([
      "--resource",
      ".nais/dev.yaml",
      "--var",
      "image=r/t/a:1",
      "--cluster",
      "dev-gcp",
      "--deploy-server",
      "deploy.example:443",
      "--owner",
      "acme",
      "--repository",
      "svc",
      "--ref",
      "0123456789abcdef",
      "--wait",
      "true",
    ]);
  });

  test("never puts the API key on the command line", () => {
    expect(deployArguments(REQUEST)).not.toContain("test-secret");
  });
});
