import { PolicyDefinitionError, ValidationError } from "@tagwarden/errors";
import { describe, expect, it } from "vitest";
import { PolicyBuilder } from "../builder.js";
import { parsePolicyDefinition, policyFromDefinition } from "../definition/parser.js";

function definitionError(input: unknown): PolicyDefinitionError {
  try {
    parsePolicyDefinition(input);
  } catch (error) {
    if (error instanceof PolicyDefinitionError) return error;
    throw error;
  }
  throw new Error("expected the definition to be rejected");
}

describe("parsePolicyDefinition", () => {
  it("accepts a complete definition", () => {
    const input = {
      extends: "basic",
      tags: ["img"],
      attributes: { img: ["src", "alt"] },
      enforcedAttributes: { a: { target: "_blank" } },
      protocols: { img: { src: ["https"] } },
      domains: { img: { src: ["example.org"] } },
      preserveRelativeLinks: true,
    };

    expect(parsePolicyDefinition(input)).toEqual(input);
  });

  it("accepts an empty tag list", () => {
    expect(parsePolicyDefinition({ tags: [] })).toEqual({ tags: [] });
  });

  it("rejects unknown keys", () => {
    const error = definitionError({ tag: ["p"] });

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.code).toBe("POLICY_DEFINITION_INVALID");
    expect(error.issues).toEqual([
      { field: "", message: "Unrecognized key(s) in object: 'tag'", code: "unrecognized_keys" },
    ]);
    expect(error.message).toBe(
      "Policy definition is invalid:\n  - (root): Unrecognized key(s) in object: 'tag'",
    );
  });

  it("rejects blank tokens with their path", () => {
    const error = definitionError({ tags: ["p", "  "] });

    expect(error.issues).toEqual([
      { field: "tags.1", message: "Must be a non-empty string", code: "custom" },
    ]);
  });

  it("rejects empty attribute lists", () => {
    const error = definitionError({ attributes: { a: [] } });

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.field).toBe("attributes.a");
    expect(error.issues[0]?.code).toBe("too_small");
  });

  it("rejects unknown presets", () => {
    const error = definitionError({ extends: "strict" });

    expect(error.issues[0]?.field).toBe("extends");
    expect(error.issues[0]?.code).toBe("invalid_enum_value");
  });

  it("rejects non-objects", () => {
    const error = definitionError("p");

    expect(error.issues).toEqual([
      { field: "", message: "Expected object, received string", code: "invalid_type" },
    ]);
  });
});

describe("policyFromDefinition", () => {
  it("extends a preset", () => {
    const policy = policyFromDefinition({
      extends: "basic",
      tags: ["img"],
      attributes: { img: ["src"] },
      protocols: { img: { src: ["https"] } },
      domains: { img: { src: ["example.org"] } },
    }).build();

    expect(policy.isTagNameAllowed("img")).toBe(true);
    expect(policy.isProtocolConfigured("img", "src", "https")).toBe(true);
    expect(policy.isDomainConfigured("img", "src", "example.org")).toBe(true);
    expect(policy.getEnforcedAttributes("a")).toEqual({ rel: "nofollow" });
  });

  it("starts from an empty builder without extends", () => {
    const policy = policyFromDefinition({ tags: ["p"] }).build();

    expect(policy.isTagNameAllowed("p")).toBe(true);
    expect(policy.isTagNameAllowed("a")).toBe(false);
  });

  it("round-trips through toDefinition", () => {
    const original = new PolicyBuilder()
      .addTags("p")
      .addAttributes(":all", "class")
      .addAttributes("a", "href", "title")
      .addEnforcedAttribute("a", "rel", "nofollow")
      .addProtocols("a", "href", "https", "#")
      .addDomains("a", "href", "example.org")
      .preserveRelativeLinks(true)
      .build();

    const definition = original.toDefinition();
    const copy = policyFromDefinition(definition).build();

    expect(copy.toDefinition()).toEqual(definition);
    expect(definition).toEqual({
      tags: [":all", "a", "p"],
      attributes: { ":all": ["class"], a: ["href", "title"] },
      enforcedAttributes: { a: { rel: "nofollow" } },
      protocols: { a: { href: ["#", "https"] } },
      domains: { a: { href: ["example.org"] } },
      preserveRelativeLinks: true,
    });
  });
});
