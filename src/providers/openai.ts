import OpenAI from "openai";
import { LLMApiError } from "../errors.js";
import type { LlmResponse } from "../types/provider.js";
import { BaseLlmModel } from "./base.js";
import { resolveApiKey } from "./credentials.js";

export class OpenAIModel extends BaseLlmModel<OpenAI> {
  readonly provider = "openai";

  protected async createClient(): Promise<OpenAI> {
    const apiKey = await resolveApiKey(this.name, this.definition, this.context);
    return new OpenAI({
      apiKey,
      timeout: this.context.timeoutMs,
      maxRetries: 0,
    });
  }

  protected async send(client: OpenAI, prompt: string): Promise<LlmResponse> {
    try {
      const response = await client.responses.create({
        model: this.definition.modelId,
        input: prompt,
        temperature: this.definition.temperature,
        max_output_tokens: this.definition.maxTokens,
      });
      return {
        content: response.output_text,
        usage: {
          inputTokens: response.usage?.input_tokens ?? 0,
          outputTokens: response.usage?.output_tokens ?? 0,
        },
      };
    } catch (error) {
      throw mapOpenAIError(error);
    }
  }
}

function mapOpenAIError(error: unknown): Error {
  if (error instanceof OpenAI.APIError) {
    return new LLMApiError(error.message, {
      provider: "openai",
      statusCode: error.status,
      cause: error,
    });
  }
  if (error instanceof Error) return error;
  return new Error(String(error));
}
