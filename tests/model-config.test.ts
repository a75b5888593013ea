import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { getDefaultConfigDir, getDefaultConfigs } from "../src/model-config.js";
import { readDefinitionTree } from "../src/catalog/reader.js";
import { validateCatalog } from "../src/catalog/validate.js";
import { FileSystemStorage } from "../src/storage/fs.js";

describe("getDefaultConfigs", () => {
  it("lists the shipped definition files in name order", () => {
    const dir = getDefaultConfigDir();
    expect(path.basename(dir)).toBe("models");
    expect(getDefaultConfigs()).toEqual([
      path.join(dir, "claude_sonnet_3_7.yaml"),
      path.join(dir, "gpt_4o.yaml"),
      path.join(dir, "llama_3_8b_instruct.yaml"),
    ]);
  });

  it("ships definitions that validate", async () => {
    const tree = await readDefinitionTree(new FileSystemStorage(getDefaultConfigDir()));
    const catalog = validateCatalog(tree);

    expect([...catalog.keys()].sort()).toEqual([
      "claude_sonnet_3_7",
      "gpt_4o",
      "llama_3_8b_instruct",
    ]);
    expect(catalog.get("gpt_4o")).toMatchObject({
      provider: "openai",
      modelId: "gpt-4o",
      apiKeySecretName: "llm-factory/openai-api-key",
      inputTokenCost: 2.5,
      outputTokenCost: 10,
      maxTokens: 4096,
    });
    expect(catalog.get("claude_sonnet_3_7")).toMatchObject({
      provider: "bedrock",
      regionName: "us-east-1",
      temperature: 0.5,
    });
  });
});
