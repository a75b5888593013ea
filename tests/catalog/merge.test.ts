import { describe, it, expect } from "vitest";
import { mergeDefinitionTrees } from "../../src/catalog/merge.js";
import { validateCatalog } from "../../src/catalog/validate.js";
import type { RawDefinitionTree } from "../../src/types/model.js";

describe("mergeDefinitionTrees", () => {
  const local: RawDefinitionTree = {
    gpt_4o: { name: "gpt_4o", provider: "openai", model_id: "gpt-4o", temperature: 0.7, max_tokens: 1024 },
    local_only: { name: "local_only", provider: "bedrock", model_id: "m1" },
  };
  const remote: RawDefinitionTree = {
    gpt_4o: { temperature: 0.2, description: "patched remotely" },
    remote_only: { name: "remote_only", provider: "openai", model_id: "m2" },
  };

  it("passes through keys present on one side only", () => {
    const merged = mergeDefinitionTrees(local, remote);
    expect(merged.local_only).toEqual(local.local_only);
    expect(merged.remote_only).toEqual(remote.remote_only);
  });

  it("overrides shared keys field by field", () => {
    const merged = mergeDefinitionTrees(local, remote);
    expect(merged.gpt_4o).toEqual({
      name: "gpt_4o",
      provider: "openai",
      model_id: "gpt-4o",
      temperature: 0.2,
      max_tokens: 1024,
      description: "patched remotely",
    });
  });

  it("does not mutate its inputs", () => {
    mergeDefinitionTrees(local, remote);
    expect(local.gpt_4o.temperature).toBe(0.7);
    expect(local.gpt_4o).not.toHaveProperty("description");
    expect(Object.keys(local)).toEqual(["gpt_4o", "local_only"]);
  });

  it("returns copies rather than the input records", () => {
    const merged = mergeDefinitionTrees(local, {});
    expect(merged.gpt_4o).toEqual(local.gpt_4o);
    expect(merged.gpt_4o).not.toBe(local.gpt_4o);
  });

  it("lets the remote side clear an optional field with null", () => {
    const merged = mergeDefinitionTrees(
      { m: { name: "m", provider: "openai", model_id: "x", description: "d" } },
      { m: { description: null } },
    );
    expect(merged.m).toEqual({ name: "m", provider: "openai", model_id: "x", description: null });
    expect(validateCatalog(merged).get("m")?.description).toBeUndefined();
  });

  it("keeps a __proto__ key as an ordinary entry", () => {
    const definition = { name: "odd", provider: "openai", model_id: "x" };
    const local: RawDefinitionTree = Object.fromEntries([["__proto__", definition]]);
    const remote: RawDefinitionTree = Object.fromEntries([["__proto__", { temperature: 0.1 }]]);

    const merged = mergeDefinitionTrees(local, remote);
    expect(Object.entries(merged)).toEqual([["__proto__", { ...definition, temperature: 0.1 }]]);
    expect(Object.getPrototypeOf(merged)).toBe(Object.prototype);
  });

  it("handles empty trees", () => {
    expect(mergeDefinitionTrees({}, {})).toEqual({});
    expect(mergeDefinitionTrees({}, remote)).toEqual(remote);
  });
});
