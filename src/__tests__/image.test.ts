import { describe, expect, test } from "@jest/globals";
import { InvalidImageReferenceError } from "../errors.js";
import { formatImageName, generateTag, registryHost } from "../image.js";

const REFERENCE = { registry: "r", team: "t", app: "a", tag: "1" };

describe("formatImageName", () => {
  test("gar includes the team", () => {
    expect(formatImageName("gar", REFERENCE)).toBe("r/t/a:1");
  });

  test("ghcr omits the team", () => {
    expect(formatImageName("ghcr", REFERENCE)).toBe("r/a:1");
  });

  test("ghcr does not need a team", () => {
    expect(formatImageName("ghcr", { ...REFERENCE, team: "" })).toBe("r/a:1");
  });

  test.each(["registry", "team", "app", "tag"] as const)(
    "an empty %s is rejected for gar",
    (field) => {
      expect(() => formatImageName("gar", { ...REFERENCE, [field]: "" })).toThrow(
        new InvalidImageReferenceError(field),
      );
    },
  );

  test("the error names the empty field", () => {
    expect(() => formatImageName("gar", { ...REFERENCE, app: "" })).toThrow(
      "docker image name could not be generated: 'app' is empty",
    );
  });
});

describe("registryHost", () => {
  test("keeps only the host of a registry path", () => {
    expect(registryHost("europe-north1-docker.pkg.dev/project/repo")).toBe(
      "europe-north1-docker.pkg.dev",
    );
  });

  test("a bare host is returned as-is", () => {
    expect(registryHost("ghcr.io")).toBe("ghcr.io");
  });
});

describe("generateTag", () => {
  const now = new Date(Date.UTC(2024, 0, 5, 7, 8, 9));

  test("formats the UTC date, time and short hash", () => {
    expect(generateTag(now, { shortHash: "abc1234", dirty: false })).toBe(
      "20240105.070809.abc1234",
    );
  });

  test("a dirty tree is marked", () => {
    expect(generateTag(now, { shortHash: "abc1234", dirty: true })).toBe(
      "20240105.070809.abc1234-dirty",
    );
  });
});
