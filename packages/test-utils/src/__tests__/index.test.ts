import { describe, expect, it } from "vitest";
import { createTestElement, PACKAGE_NAME, TestElement } from "../index.js";

describe("@tagwarden/test-utils", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@tagwarden/test-utils");
  });
});

describe("TestElement", () => {
  it("reports its tag name and attributes case-insensitively", () => {
    const el = createTestElement({ tagName: "a", attributes: { HREF: "/docs" } });

    expect(el).toBeInstanceOf(TestElement);
    expect(el.tagName()).toBe("a");
    expect(el.hasAttribute("href")).toBe(true);
    expect(el.getAttributeValue("Href")).toBe("/docs");
    expect(el.hasAttribute("title")).toBe(false);
    expect(el.getAttributeValue("title")).toBe("");
  });

  it("resolves relative values against the base URI", () => {
    const el = createTestElement({
      tagName: "a",
      attributes: { href: "../guide?x=1" },
      baseUri: "https://example.com/docs/intro/",
    });

    expect(el.resolveAbsoluteUrl("href")).toBe("https://example.com/docs/guide?x=1");
  });

  it("answers empty for relative values without a base URI", () => {
    const el = createTestElement({ tagName: "a", attributes: { href: "/docs" } });
    expect(el.resolveAbsoluteUrl("href")).toBe("");
  });

  it("answers empty for a missing attribute", () => {
    const el = createTestElement({ tagName: "img", baseUri: "https://example.com/" });
    expect(el.resolveAbsoluteUrl("src")).toBe("");
  });

  it("resolves absolute values without a base URI", () => {
    const el = createTestElement({ tagName: "a", attributes: { href: "tel:+15550100" } });
    expect(el.resolveAbsoluteUrl("href")).toBe("tel:+15550100");
  });

  it("records and applies writes", () => {
    const el = createTestElement({ tagName: "a", attributes: { href: "/docs" } });
    el.setAttributeValue("href", "https://example.com/docs");

    expect(el.setAttributeValue).toHaveBeenCalledWith("href", "https://example.com/docs");
    expect(el.getAttributeValue("href")).toBe("https://example.com/docs");
  });
});
