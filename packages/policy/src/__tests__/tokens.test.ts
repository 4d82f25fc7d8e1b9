import { InvalidTokenError } from "@tagwarden/errors";
import { describe, expect, it } from "vitest";
import {
  toAttributeKey,
  toAttributeValue,
  toDomain,
  toProtocol,
  toTagName,
  tryToken,
} from "../tokens.js";

describe("token constructors", () => {
  it("trims and lower-cases names", () => {
    expect(toTagName("  DIV ")).toBe("div");
    expect(toAttributeKey("HREF")).toBe("href");
    expect(toProtocol("HTTPS")).toBe("https");
    expect(toDomain(" Example.ORG ")).toBe("example.org");
  });

  it("converts internationalized domains to their ASCII form", () => {
    expect(toDomain("Bücher.Example")).toBe("xn--bcher-kva.example");
    expect(toDomain("xn--bcher-kva.example")).toBe("xn--bcher-kva.example");
  });

  it("keeps attribute values verbatim", () => {
    expect(toAttributeValue("  NoFollow ")).toBe("  NoFollow ");
  });

  it("rejects empty and blank input", () => {
    expect(() => toTagName("")).toThrow(InvalidTokenError);
    expect(() => toAttributeValue("   ")).toThrow(InvalidTokenError);
    expect(() => toDomain("\t")).toThrow("Domain must be a non-empty string, got blank string");
  });
});

describe("tryToken", () => {
  it("answers undefined for blank or missing input", () => {
    expect(tryToken(toTagName, "")).toBeUndefined();
    expect(tryToken(toTagName, "  ")).toBeUndefined();
    expect(tryToken(toTagName, null)).toBeUndefined();
    expect(tryToken(toTagName, undefined)).toBeUndefined();
  });

  it("builds the token otherwise", () => {
    expect(tryToken(toTagName, " P ")).toBe("p");
  });
});
