import type { ModelType } from "../agents/types.js";
import type { ModelClient } from "./client.js";
import { ModelProviderError, ModelRateLimitedError, ModelTimeoutError, describeError } from "../errors.js";
import { logger } from "../utils/logger.js";

export interface GeminiClientOptions {
  apiKey: string;
  baseUrl: string;
  models: Record<ModelType, string>;
  timeoutMs: number;
  /** Injected in tests */
  fetchFn?: typeof fetch;
}

type GeminiPart = { text?: string; thought?: boolean };

type GeminiResponse = {
  candidates?: Array<{
    content?: { parts?: GeminiPart[] };
    finishReason?: string;
  }>;
  promptFeedback?: { blockReason?: string };
};

export class GeminiClient implements ModelClient {
  private fetchFn: typeof fetch;

  constructor(private options: GeminiClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async complete(prompt: string, modelType: ModelType): Promise<string> {
    const model = this.options.models[modelType];
    const url = `${this.options.baseUrl.replace(/\/+$/, "")}/models/${model}:generateContent`;

    const controller = new AbortController();
    let timedOut = false;
    // Covers the body as well as the headers
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchFn(url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "x-goog-api-key": this.options.apiKey,
          },
          body: JSON.stringify({ contents: [{ role: "user", parts: [{ text: prompt }] }] }),
          signal: controller.signal,
        });
      } catch (err) {
        if (timedOut) throw new ModelTimeoutError(this.options.timeoutMs, { cause: err });
        throw new ModelProviderError(`Gemini request failed: ${String(err)}`, undefined, { cause: err });
      }

      if (response.status === 429) {
        const detail = await response.text().catch(() => "");
        throw new ModelRateLimitedError(detail.slice(0, 200) || "HTTP 429");
      }

      if (!response.ok) {
        const detail = await response.text().catch(() => "");
        throw new ModelProviderError(
          `Gemini request failed (${response.status}): ${detail.slice(0, 200)}`,
          response.status,
        );
      }

      let data: GeminiResponse;
      try {
        data = (await response.json()) as GeminiResponse;
      } catch (err) {
        if (timedOut) throw new ModelTimeoutError(this.options.timeoutMs, { cause: err });
        throw new ModelProviderError(
          `Gemini returned an unreadable response: ${describeError(err)}`,
          response.status,
          { cause: err },
        );
      }

      const text = extractText(data);
      if (!text) {
        logger.warn(
          { model, finishReason: data.candidates?.[0]?.finishReason, blockReason: data.promptFeedback?.blockReason },
          "Gemini response had no text content",
        );
        throw new ModelProviderError("Gemini response contained no text");
      }

      return text;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function extractText(data: GeminiResponse): string {
  const parts = data.candidates?.[0]?.content?.parts ?? [];
  return parts
    .filter((p) => !p.thought && typeof p.text === "string")
    .map((p) => p.text)
    .join("")
    .trim();
}
