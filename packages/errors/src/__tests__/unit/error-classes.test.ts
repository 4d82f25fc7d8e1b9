import { describe, expect, it } from "vitest";
import {
  InternalError,
  InvalidArgumentError,
  InvalidTokenError,
  isError,
  isTagwardenError,
  NotFoundError,
  PolicyDefinitionError,
  PolicyFileNotFoundError,
  PolicyParseError,
  PresetLoadError,
  TagwardenError,
  ValidationError,
} from "../../index.js";

describe("TagwardenError base class", () => {
  it("should create error with correct properties", () => {
    const error = new InternalError("Test error");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(TagwardenError);
    expect(error.message).toBe("Test error");
    expect(error.name).toBe("InternalError");
    expect(error._tag).toBe("InternalError");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.httpStatus).toBe(500);
    expect(error.grpcCode).toBe("INTERNAL");
    expect(error.domain).toBe("internal");
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it("should serialize to JSON", () => {
    const error = new InternalError("JSON test", { key: "value" }, "trace-123");
    const json = error.toJSON();

    expect(json).toMatchObject({
      _tag: "InternalError",
      name: "InternalError",
      code: "INTERNAL_ERROR",
      message: "JSON test",
      domain: "internal",
      httpStatus: 500,
      grpcCode: "INTERNAL",
      metadata: { key: "value" },
      traceId: "trace-123",
    });
    expect(json.timestamp).toBe(error.timestamp.toISOString());
    expect(json.stack).toBeDefined();
  });

  it("should convert to string with metadata and trace", () => {
    const error = new InternalError("String test", { key: "value" }, "trace-123");

    expect(error.toString()).toBe(
      'InternalError [INTERNAL_ERROR]: String test {"key":"value"} [trace: trace-123]',
    );
  });

  it("should keep the cause when built from options", () => {
    const cause = new Error("root");
    const error = new InternalError({ code: "INTERNAL_ERROR", message: "wrapped", cause });

    expect(error.cause).toBe(cause);
  });
});

describe("ValidationError", () => {
  it("should construct with validation issues", () => {
    const issues = [
      { field: "tags", message: "Required", code: "invalid_type" },
      { field: "attributes.a", message: "Too short", code: "too_small", value: [] },
    ];

    const error = new ValidationError("Validation failed", issues);

    expect(error._tag).toBe("ValidationError");
    expect(error.code).toBe("VALIDATION_FAILED");
    expect(error.issues).toEqual(issues);
    expect(error.httpStatus).toBe(400);
  });
});

describe("InvalidArgumentError", () => {
  it("should name the offending argument", () => {
    const error = new InvalidArgumentError("keys", "at least one value is required");

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.name).toBe("InvalidArgumentError");
    expect(error.code).toBe("POLICY_INVALID_ARGUMENT");
    expect(error.domain).toBe("policy");
    expect(error.argument).toBe("keys");
    expect(error.message).toBe("Invalid argument 'keys': at least one value is required");
    expect(error.issues).toEqual([
      { field: "keys", message: "at least one value is required", code: "INVALID_ARGUMENT" },
    ]);
  });
});

describe("InvalidTokenError", () => {
  it("should describe the rejected input", () => {
    expect(new InvalidTokenError("TagName", "").message).toBe(
      "TagName must be a non-empty string, got empty string",
    );
    expect(new InvalidTokenError("Protocol", "   ").message).toBe(
      "Protocol must be a non-empty string, got blank string",
    );
    expect(new InvalidTokenError("Domain", null).message).toBe(
      "Domain must be a non-empty string, got null",
    );
    expect(new InvalidTokenError("AttributeKey", 42).message).toBe(
      "AttributeKey must be a non-empty string, got number",
    );
  });

  it("should carry the namespace and input", () => {
    const error = new InvalidTokenError("TagName", undefined);

    expect(error.code).toBe("POLICY_INVALID_TOKEN");
    expect(error.namespace).toBe("TagName");
    expect(error.received).toBeUndefined();
  });
});

describe("PolicyDefinitionError", () => {
  it("should list every schema issue", () => {
    const error = new PolicyDefinitionError([
      { field: "tags.0", message: "Expected string, received number", code: "invalid_type" },
      { field: "", message: "Unrecognized key(s) in object: 'tag'", code: "unrecognized_keys" },
    ]);

    expect(error.code).toBe("POLICY_DEFINITION_INVALID");
    expect(error.httpStatus).toBe(422);
    expect(error.message).toBe(
      "Policy definition is invalid:\n" +
        "  - tags.0: Expected string, received number\n" +
        "  - (root): Unrecognized key(s) in object: 'tag'",
    );
    expect(error.issues).toHaveLength(2);
  });
});

describe("NotFoundError", () => {
  it("should describe the missing resource", () => {
    const error = new NotFoundError("Preset", "strict");

    expect(error._tag).toBe("NotFoundError");
    expect(error.code).toBe("RESOURCE_NOT_FOUND");
    expect(error.httpStatus).toBe(404);
    expect(error.grpcCode).toBe("NOT_FOUND");
    expect(error.message).toBe("Preset 'strict' not found");
  });
});

describe("PolicyFileNotFoundError", () => {
  it("should carry the path", () => {
    const error = new PolicyFileNotFoundError("/srv/policies/basic.yaml");

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.code).toBe("POLICY_FILE_NOT_FOUND");
    expect(error.filePath).toBe("/srv/policies/basic.yaml");
    expect(error.message).toBe("Policy file not found: /srv/policies/basic.yaml");
  });
});

describe("PolicyParseError", () => {
  it("should include file and position when known", () => {
    const error = new PolicyParseError("policy.yaml", "Unexpected token", 3, 7);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.code).toBe("POLICY_PARSE_FAILED");
    expect(error.line).toBe(3);
    expect(error.column).toBe(7);
    expect(error.message).toBe("Policy parse failed (policy.yaml) at line 3:7: Unexpected token");
  });

  it("should omit what is unknown", () => {
    expect(new PolicyParseError(undefined, "Unexpected token").message).toBe(
      "Policy parse failed: Unexpected token",
    );
  });
});

describe("PresetLoadError", () => {
  it("should be an unexpected internal error", () => {
    const error = new PresetLoadError("basic", new Error("bad table"));

    expect(error).toBeInstanceOf(InternalError);
    expect(error.code).toBe("POLICY_PRESET_INVALID");
    expect(error.isExpected).toBe(false);
    expect(error.preset).toBe("basic");
    expect(error.message).toBe("Bundled preset 'basic' could not be loaded: bad table");
  });
});

describe("isError / isTagwardenError", () => {
  it("should discriminate error values", () => {
    expect(isError(new Error("x"))).toBe(true);
    expect(isError("x")).toBe(false);
    expect(isTagwardenError(new InvalidArgumentError("tag", "missing"))).toBe(true);
    expect(isTagwardenError(new Error("x"))).toBe(false);
  });
});
