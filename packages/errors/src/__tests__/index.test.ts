import { describe, expect, it } from "vitest";
import { InternalError, PACKAGE_NAME, TagwardenError, ValidationError } from "../index.js";

describe("@tagwarden/errors", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@tagwarden/errors");
  });

  describe("TagwardenError base class", () => {
    it("should create error with message", () => {
      // Use InternalError as concrete implementation
      const error = new InternalError("test error");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(TagwardenError);
      expect(error.message).toBe("test error");
      expect(error.name).toBe("InternalError");
    });

    it("should preserve stack trace", () => {
      const error = new InternalError("test error");
      expect(error.stack).toBeDefined();
      expect(error.stack).toContain("InternalError");
    });

    it("should support metadata and traceId", () => {
      const error = new InternalError("test error", { userId: "123" }, "trace-abc");
      expect(error.metadata).toEqual({ userId: "123" });
      expect(error.traceId).toBe("trace-abc");
    });
  });

  describe("ValidationError", () => {
    it("should default to VALIDATION_FAILED with no issues", () => {
      const error = new ValidationError("bad input");
      expect(error.code).toBe("VALIDATION_FAILED");
      expect(error.issues).toEqual([]);
      expect(error.isExpected).toBe(true);
    });
  });
});
