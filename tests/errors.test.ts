import { describe, expect, it } from "vitest";
import {
  LlmFactoryError,
  ConfigLoadError,
  ConfigValidationError,
  ModelNotFoundError,
  ModelConfigurationError,
  LLMApiError,
  toError,
} from "../src/errors.js";

describe("LlmFactoryError", () => {
  it("should create with message", () => {
    const err = new LlmFactoryError("something went wrong");
    expect(err.message).toBe("something went wrong");
    expect(err.name).toBe("LlmFactoryError");
    expect(err).toBeInstanceOf(Error);
  });

  it("should propagate cause", () => {
    const cause = new Error("root cause");
    const err = new LlmFactoryError("wrapped", { cause });
    expect(err.cause).toBe(cause);
  });
});

describe("ConfigLoadError", () => {
  it("should store location and source position", () => {
    const err = new ConfigLoadError("bad yaml", {
      location: "/models/gpt_4o.yaml",
      line: 3,
      column: 7,
    });
    expect(err.name).toBe("ConfigLoadError");
    expect(err.location).toBe("/models/gpt_4o.yaml");
    expect(err.line).toBe(3);
    expect(err.column).toBe(7);
    expect(err).toBeInstanceOf(LlmFactoryError);
  });

  it("should work without position", () => {
    const err = new ConfigLoadError("not a directory", { location: "/nope" });
    expect(err.line).toBeUndefined();
    expect(err.column).toBeUndefined();
  });
});

describe("ConfigValidationError", () => {
  it("should keep every issue and list them in the message", () => {
    const err = new ConfigValidationError([
      { model: "a", field: "temperature", message: "too high" },
      { model: "b", field: "", message: "not an object" },
    ]);
    expect(err.name).toBe("ConfigValidationError");
    expect(err.issues).toHaveLength(2);
    expect(err.message).toBe(
      "Configuration validation failed with 2 issue(s):\n  a.temperature: too high\n  b: not an object",
    );
    expect(Object.isFrozen(err.issues)).toBe(true);
  });
});

describe("ModelNotFoundError", () => {
  it("should name the missing model", () => {
    const err = new ModelNotFoundError("missing");
    expect(err.message).toBe("Config for 'missing' not found.");
    expect(err.modelName).toBe("missing");
    expect(err.name).toBe("ModelNotFoundError");
    expect(err).toBeInstanceOf(LlmFactoryError);
  });

  it("should not be instanceof ModelConfigurationError", () => {
    expect(new ModelNotFoundError("x")).not.toBeInstanceOf(ModelConfigurationError);
  });
});

describe("LLMApiError", () => {
  it("should store provider and statusCode", () => {
    const err = new LLMApiError("api failed", { provider: "openai", statusCode: 500 });
    expect(err.name).toBe("LLMApiError");
    expect(err.provider).toBe("openai");
    expect(err.statusCode).toBe(500);
  });
});

describe("toError", () => {
  it("passes errors through and wraps other values", () => {
    const err = new Error("x");
    expect(toError(err)).toBe(err);
    expect(toError("plain").message).toBe("plain");
  });
});
