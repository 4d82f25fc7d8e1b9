import { describe, expect, it } from "vitest";
import { PACKAGE_NAME, PolicyBuilder, policyFromDefinition, relaxedPreset, WILDCARD_TAG } from "../index.js";

describe("@tagwarden/policy", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@tagwarden/policy");
  });

  it("should export the wildcard tag", () => {
    expect(WILDCARD_TAG).toBe(":all");
  });

  it("should expose the builder, presets and definitions", () => {
    expect(new PolicyBuilder().build().isTagNameAllowed("p")).toBe(false);
    expect(relaxedPreset().build().isTagNameAllowed("table")).toBe(true);
    expect(policyFromDefinition({ extends: "relaxed" }).build().isTagNameAllowed("h1")).toBe(true);
  });
});
