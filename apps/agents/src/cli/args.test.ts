import { describe, expect, it } from "vitest";

import { readFlag, requireFlag } from "./args";

describe("readFlag", () => {
  it("reads both flag spellings", () => {
    expect(readFlag(["--out-dir=/tmp/out"], "out-dir")).toBe("/tmp/out");
    expect(readFlag(["--out-dir", "/tmp/out"], "out-dir")).toBe("/tmp/out");
  });

  it("treats a missing or blank value as absent", () => {
    expect(readFlag(["--out-dir", "--job=job.json"], "out-dir")).toBeUndefined();
    expect(readFlag(["--out-dir=  "], "out-dir")).toBeUndefined();
    expect(readFlag([], "out-dir")).toBeUndefined();
  });

  it("does not match a flag that only shares a prefix", () => {
    expect(readFlag(["--repo-dir-extra=x"], "repo-dir")).toBeUndefined();
  });

  it("lets the last occurrence win", () => {
    expect(readFlag(["--job=a.json", "--job", "b.json"], "job")).toBe("b.json");
  });
});

describe("requireFlag", () => {
  it("throws with the usage line", () => {
    expect(() => requireFlag([], "semantic", "validate --semantic=<path>")).toThrow(
      "Missing --semantic.\nUsage: validate --semantic=<path>"
    );
  });
});
