import OpenAI from "openai";
import type { TextModel } from "../types/Capabilities.js";
import { ThrottlingError } from "../utils/errors.js";

/**
 * The SDK's own retries are disabled; SummarizeService owns the throttling policy
 */
export function createOpenAiClient(apiKey: string): OpenAI {
  return new OpenAI({ apiKey, maxRetries: 0 });
}

/**
 * TextModel backed by OpenAI chat completions. HTTP 429 surfaces as ThrottlingError.
 */
export function createOpenAiTextModel(client: OpenAI): TextModel {
  return {
    async invoke(request) {
      try {
        const completion = await client.chat.completions.create({
          model: request.modelId,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.prompt },
          ],
          max_tokens: request.maxOutputTokens,
          temperature: request.temperature,
          stop: request.stopSequences,
        });
        return completion.choices[0]?.message.content ?? undefined;
      } catch (error) {
        if (error instanceof OpenAI.RateLimitError) {
          throw new ThrottlingError(error.message, { cause: error });
        }
        throw error;
      }
    },
  };
}
