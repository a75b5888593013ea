import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ModelConfigurationError } from "../../src/errors.js";
import { InMemoryParameterStore } from "../helpers.js";

const mockSend = vi.fn();

vi.mock("@aws-sdk/client-ssm", () => {
  class SSMClient {
    send = mockSend;
    constructor(_opts?: Record<string, unknown>) {}
  }
  class GetParameterCommand {
    constructor(readonly input: Record<string, unknown>) {}
  }
  return { SSMClient, GetParameterCommand };
});

const { SsmParameterStore, resolveParameter } = await import("../../src/aws/parameter-store.js");

describe("SsmParameterStore", () => {
  beforeEach(() => {
    mockSend.mockReset();
  });

  it("fetches a decrypted parameter value", async () => {
    mockSend.mockResolvedValueOnce({ Parameter: { Value: "s3://bucket/models" } });
    const store = new SsmParameterStore();
    expect(await store.getParameter("/LLM_CONFIG/MODELS_CONFIG_S3_PATH")).toBe("s3://bucket/models");
    expect(mockSend.mock.calls[0][0].input).toEqual({
      Name: "/LLM_CONFIG/MODELS_CONFIG_S3_PATH",
      WithDecryption: true,
    });
  });

  it("returns undefined when the parameter has no value", async () => {
    mockSend.mockResolvedValueOnce({});
    expect(await new SsmParameterStore().getParameter("/empty")).toBeUndefined();
  });
});

describe("resolveParameter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the value when present", async () => {
    const store = new InMemoryParameterStore({ "/p": "value" });
    expect(await resolveParameter(store, "/p", { required: true })).toBe("value");
    expect(await resolveParameter(store, "/p", { required: false })).toBe("value");
  });

  it("logs and returns undefined for an optional failing lookup", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const store = new InMemoryParameterStore();
    store.fail("/p");
    expect(await resolveParameter(store, "/p", { required: false })).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain("Failed to load parameter '/p': ParameterNotFound: /p");
  });

  it("returns undefined for an optional missing value", async () => {
    const store = new InMemoryParameterStore();
    expect(await resolveParameter(store, "/p", { required: false })).toBeUndefined();
  });

  it("throws ModelConfigurationError for a required failing lookup", async () => {
    const store = new InMemoryParameterStore();
    store.fail("/p");
    await expect(resolveParameter(store, "/p", { required: true })).rejects.toThrow(
      new ModelConfigurationError("Failed to load parameter '/p': ParameterNotFound: /p"),
    );
  });

  it("throws ModelConfigurationError for a required empty value", async () => {
    const store = new InMemoryParameterStore({ "/p": "" });
    await expect(resolveParameter(store, "/p", { required: true })).rejects.toBeInstanceOf(
      ModelConfigurationError,
    );
    await expect(resolveParameter(store, "/p", { required: true })).rejects.toThrow(
      "Parameter '/p' has no value.",
    );
  });
});
