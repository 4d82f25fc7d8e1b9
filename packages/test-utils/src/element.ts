import type { PolicyElement } from "@tagwarden/policy";
import { vi } from "vitest";

export interface TestElementInit {
  readonly tagName: string;
  readonly attributes?: Readonly<Record<string, string>>;
  /** Base URI relative attribute values resolve against. Omit for none. */
  readonly baseUri?: string;
}

/**
 * In-memory PolicyElement for testing
 *
 * Attribute keys are case-insensitive. `resolveAbsoluteUrl` resolves with
 * the WHATWG URL parser against `baseUri` and answers an empty string when
 * the attribute is missing or does not resolve. `setAttributeValue` is a
 * vitest spy that also writes through.
 *
 * @example
 * ```typescript
 * import { TestElement } from '@tagwarden/test-utils';
 *
 * const link = new TestElement({ tagName: 'a', attributes: { href: '/docs' }, baseUri: 'https://example.com/' });
 * link.resolveAbsoluteUrl('href'); // 'https://example.com/docs'
 * ```
 */
export class TestElement implements PolicyElement {
  readonly baseUri: string | undefined;
  private readonly name: string;
  private readonly attributes = new Map<string, string>();

  readonly setAttributeValue: (key: string, value: string) => void = vi.fn<
    (key: string, value: string) => void
  >((key, value) => {
    this.attributes.set(key.toLowerCase(), value);
  });

  constructor(init: TestElementInit) {
    this.name = init.tagName;
    this.baseUri = init.baseUri;
    for (const [key, value] of Object.entries(init.attributes ?? {})) {
      this.attributes.set(key.toLowerCase(), value);
    }
  }

  tagName(): string {
    return this.name;
  }

  hasAttribute(key: string): boolean {
    return this.attributes.has(key.toLowerCase());
  }

  getAttributeValue(key: string): string {
    return this.attributes.get(key.toLowerCase()) ?? "";
  }

  resolveAbsoluteUrl(key: string): string {
    const value = this.attributes.get(key.toLowerCase());
    if (value === undefined) return "";
    try {
      return (this.baseUri ? new URL(value, this.baseUri) : new URL(value)).href;
    } catch {
      return "";
    }
  }
}

/** Shorthand for `new TestElement(...)` */
export function createTestElement(init: TestElementInit): TestElement {
  return new TestElement(init);
}
