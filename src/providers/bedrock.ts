import {
  BedrockRuntimeClient,
  BedrockRuntimeServiceException,
  ConverseCommand,
} from "@aws-sdk/client-bedrock-runtime";
import { LLMApiError } from "../errors.js";
import type { LlmResponse } from "../types/provider.js";
import { BaseLlmModel } from "./base.js";

/** AWS Bedrock chat models through the Converse API. Credentials come from the default AWS chain. */
export class BedrockModel extends BaseLlmModel<BedrockRuntimeClient> {
  readonly provider = "bedrock";

  protected async createClient(): Promise<BedrockRuntimeClient> {
    return new BedrockRuntimeClient({
      region: this.definition.regionName ?? this.context.awsRegion,
    });
  }

  protected async send(client: BedrockRuntimeClient, prompt: string): Promise<LlmResponse> {
    try {
      const response = await client.send(
        new ConverseCommand({
          modelId: this.definition.modelId,
          messages: [{ role: "user", content: [{ text: prompt }] }],
          inferenceConfig: {
            maxTokens: this.definition.maxTokens,
            temperature: this.definition.temperature,
          },
        }),
        this.context.timeoutMs
          ? { abortSignal: AbortSignal.timeout(this.context.timeoutMs) }
          : {},
      );
      const blocks = response.output?.message?.content ?? [];
      return {
        content: blocks.map((block) => block.text ?? "").join(""),
        usage: {
          inputTokens: response.usage?.inputTokens ?? 0,
          outputTokens: response.usage?.outputTokens ?? 0,
        },
      };
    } catch (error) {
      if (error instanceof BedrockRuntimeServiceException) {
        throw new LLMApiError(error.message, {
          provider: "bedrock",
          statusCode: error.$metadata.httpStatusCode,
          cause: error,
        });
      }
      throw error;
    }
  }
}
