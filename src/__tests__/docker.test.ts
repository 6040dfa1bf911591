import { beforeEach, describe, expect, jest, test } from "@jest/globals";
import * as exec from "@actions/exec";
import { NaisDeployClient } from "../deploy.js";
import { DockerEngine } from "../docker.js";
import { ProcessError } from "../errors.js";
import { output } from "../exec.js";

jest.mock("@actions/exec");

const mockExec = jest.mocked(exec.exec);
const mockGetExecOutput = jest.mocked(exec.getExecOutput);

beforeEach(() => {
  jest.resetAllMocks();
  mockExec.mockResolvedValue(0);
});

// ---------------------------------------------------------------------------
// DockerEngine
// ---------------------------------------------------------------------------

describe("DockerEngine", () => {
  test("build passes the Dockerfile, tag and context", async () => {
    await new DockerEngine().build("/tmp/nb-1/Dockerfile", "r/t/a:1", "/src");
    expect(mockExec).toHaveBeenCalledWith(
      "docker",
      ["build", "--file", "/tmp/nb-1/Dockerfile", "--tag", "r/t/a:1", "/src"],
      expect.objectContaining({ ignoreReturnCode: true }),
    );
  });

  test("login sends the password on standard input", async () => {
    await new DockerEngine().login("ghcr.io", "octo", "test-secret");

    expect(mockExec).toHaveBeenCalledTimes(1);
    const [command, args, options] = mockExec.mock.calls[0];
    expect(command).toBe("docker");
    expect(args).toEqual(["login", "ghcr.io", "--username", "octo", "--password-stdin"]);
    expect(args).not.toContain("test-secret");
    expect(options?.input?.toString()).toBe("test-secret");
  });

  test("a non-zero exit is a process error carrying the status", async () => {
    mockExec.mockResolvedValue(1);
    const err = await new DockerEngine().push("r/t/a:1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProcessError);
    expect(err).toMatchObject({
      exitCode: 1,
      message: "docker push failed with exit code 1",
    });
  });

  test("a command that cannot start is a process error", async () => {
    mockExec.mockRejectedValue(new Error("Unable to locate executable file: docker"));
    await expect(new DockerEngine().logout("ghcr.io")).rejects.toThrow(
      "docker logout could not be started: Unable to locate executable file: docker",
    );
  });
});

// ---------------------------------------------------------------------------
// Deploy client
// ---------------------------------------------------------------------------

describe("NaisDeployClient", () => {
  test("passes the API key through the environment only", async () => {
    await new NaisDeployClient().deploy({
      apiKey: "test-secret",
      deployServer: "deploy.example:443",
      cluster: "dev-gcp",
      owner: "acme",
      repository: "svc",
      ref: "abc",
      resources: ["nais.yaml"],
      vars: {},
      wait: true,
    });

    const [command, args, options] = mockExec.mock.calls[0];
    expect(command).toBe("deploy");
    expect(args).not.toContain("test-secret");
    expect(options?.env?.["APIKEY"]).toBe("test-secret");
  });
});

// ---------------------------------------------------------------------------
// output
// ---------------------------------------------------------------------------

describe("output", () => {
  test("returns trimmed standard output", async () => {
    mockGetExecOutput.mockResolvedValue({ exitCode: 0, stdout: "abc1234\n", stderr: "" });
    await expect(output("git", "rev-parse", ["rev-parse", "--short", "HEAD"])).resolves.toBe(
      "abc1234",
    );
    expect(mockGetExecOutput).toHaveBeenCalledWith(
      "git",
      ["rev-parse", "--short", "HEAD"],
      expect.objectContaining({ silent: true }),
    );
  });

  test("a failing command is a process error", async () => {
    mockGetExecOutput.mockResolvedValue({ exitCode: 128, stdout: "", stderr: "fatal" });
    await expect(output("git", "rev-parse", ["rev-parse", "HEAD"])).rejects.toThrow(
      "git rev-parse failed with exit code 128",
    );
  });
});
