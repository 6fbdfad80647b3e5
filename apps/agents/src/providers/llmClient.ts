import { z } from "zod";
import type { LlmConfig } from "../config";

/** Per-request model settings; anything left out falls back to the gateway config. */
export interface LlmOverrides {
  model?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface LlmCallOptions extends LlmOverrides {
  timeoutMs?: number;
}

type ModelSettings = Required<LlmOverrides>;

/**
 * Opaque text-in/text-out model boundary. Implementations throw
 * `LlmGatewayError` on transport failures, timeouts and empty completions.
 */
export interface LlmGateway {
  generate(prompt: string, options?: LlmCallOptions): Promise<string>;
}

export class LlmGatewayError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "LlmGatewayError";
  }
}

const OllamaResponseSchema = z.object({
  response: z.string(),
});

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
});

function trimTrailingSlash(url: string) {
  return url.replace(/\/+$/, "");
}

export class HttpLlmGateway implements LlmGateway {
  constructor(private readonly config: LlmConfig) {}

  async generate(prompt: string, options: LlmCallOptions = {}) {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const settings: ModelSettings = {
      model: options.model ?? this.config.model,
      baseUrl: options.baseUrl ?? this.config.baseUrl,
      temperature: options.temperature ?? this.config.temperature,
      maxTokens: options.maxTokens ?? this.config.maxTokens,
    };
    const payload = await this.post(this.buildRequest(prompt, settings), timeoutMs);
    const text = this.extractText(payload).trim();
    if (!text) {
      throw new LlmGatewayError("Model returned an empty completion.");
    }
    return text;
  }

  private buildRequest(prompt: string, settings: ModelSettings) {
    const baseUrl = trimTrailingSlash(settings.baseUrl);
    const headers: Record<string, string> = { "Content-Type": "application/json" };

    if (this.config.provider === "ollama") {
      return {
        url: `${baseUrl}/api/generate`,
        headers,
        body: {
          model: settings.model,
          prompt,
          stream: false,
          options: {
            temperature: settings.temperature,
            num_predict: settings.maxTokens,
          },
        },
      };
    }

    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }
    return {
      url: `${baseUrl}/v1/chat/completions`,
      headers,
      body: {
        model: settings.model,
        messages: [{ role: "user", content: prompt }],
        temperature: settings.temperature,
        max_tokens: settings.maxTokens,
        stream: false,
      },
    };
  }

  private async post(
    request: { url: string; headers: Record<string, string>; body: unknown },
    timeoutMs: number
  ): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(request.url, {
        method: "POST",
        headers: request.headers,
        body: JSON.stringify(request.body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new LlmGatewayError(`LLM request timed out after ${timeoutMs}ms.`);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new LlmGatewayError(`LLM request failed: ${message}`);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new LlmGatewayError(
        `LLM request failed with ${response.status}: ${body || response.statusText}`,
        response.status
      );
    }

    try {
      return await response.json();
    } catch {
      throw new LlmGatewayError("LLM response body was not JSON.", response.status);
    }
  }

  private extractText(payload: unknown) {
    if (this.config.provider === "ollama") {
      const parsed = OllamaResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new LlmGatewayError("Unexpected ollama response shape.");
      }
      return parsed.data.response;
    }

    const parsed = ChatCompletionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new LlmGatewayError("Unexpected openai response shape.");
    }
    return parsed.data.choices[0].message.content ?? "";
  }
}
