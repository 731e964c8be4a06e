import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from "openai";
import { ModelRequestRejected, ModelUnavailable } from "./errors.js";
import { log } from "./logger.js";
import type { EngineConfig } from "./types.js";

export interface GenerationRequest {
  system: string;
  user: string;
}

export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
  /** Label for log lines */
  operation?: string;
}

/**
 * Text-generation boundary. Implementations throw ModelUnavailable for
 * conditions a retry may clear and ModelRequestRejected otherwise.
 */
export interface GenerativeModel {
  generate(request: GenerationRequest, options?: GenerationOptions): Promise<string>;
}

type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

/** The slice of the OpenAI SDK this module calls; tests pass a stub. */
export interface ChatCompletionsApi {
  create(
    body: { model: string; messages: ChatMessage[]; temperature?: number; max_tokens?: number },
    options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number },
  ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
}

const RETRYABLE_STATUS = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

/**
 * Map an SDK failure onto the engine's taxonomy: connection problems, rate
 * limits and 5xx are transient; other HTTP errors are definitive.
 */
export function classifyOpenAiError(err: unknown, what: string): Error {
  if (err instanceof APIUserAbortError) {
    return new ModelUnavailable(`${what}: request aborted`, err);
  }
  if (err instanceof APIConnectionError) {
    return new ModelUnavailable(`${what}: connection failed (${err.message})`, err);
  }
  if (err instanceof APIError) {
    const status = typeof err.status === "number" ? err.status : undefined;
    if (status === undefined || RETRYABLE_STATUS.has(status) || status >= 500) {
      return new ModelUnavailable(`${what}: service error ${status ?? "unknown"}`, err);
    }
    return new ModelRequestRejected(`${what}: request rejected with ${status}`, err);
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ModelUnavailable(`${what}: ${message}`, err);
}

export function createOpenAiClient(config: Pick<EngineConfig, "openaiApiKey" | "openaiBaseUrl">): OpenAI {
  return new OpenAI({
    // Local OpenAI-compatible servers accept any key.
    apiKey: config.openaiApiKey ?? "unset",
    ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
    // Retries are owned by the engine's own bounded loop.
    maxRetries: 0,
  });
}

export class OpenAiChatModel implements GenerativeModel {
  private readonly api: ChatCompletionsApi;

  constructor(
    private readonly config: Pick<EngineConfig, "model" | "modelTimeoutMs" | "openaiApiKey" | "openaiBaseUrl">,
    api?: ChatCompletionsApi,
  ) {
    if (api) {
      this.api = api;
    } else {
      if (!config.openaiApiKey && !config.openaiBaseUrl) {
        log.warn("no OpenAI API key or base URL; extraction and contradiction checks will fail");
      }
      const client = createOpenAiClient(config);
      this.api = {
        create: (body, options) => client.chat.completions.create(body, options),
      };
    }
  }

  async generate(request: GenerationRequest, options: GenerationOptions = {}): Promise<string> {
    const operation = options.operation ?? "generation";

    const startedAtMs = Date.now();
    let response: Awaited<ReturnType<ChatCompletionsApi["create"]>>;
    try {
      response = await this.api.create(
        {
          model: this.config.model,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.user },
          ],
          temperature: options.temperature ?? 0.1,
          max_tokens: options.maxTokens ?? 1024,
        },
        { signal: options.signal, timeout: this.config.modelTimeoutMs, maxRetries: 0 },
      );
    } catch (err) {
      throw classifyOpenAiError(err, operation);
    }

    const content = response.choices[0]?.message.content;
    log.debug(`${operation}: model=${this.config.model} durationMs=${Date.now() - startedAtMs} chars=${content?.length ?? 0}`);
    if (!content) {
      throw new ModelUnavailable(`${operation}: empty response from model`);
    }
    return content;
  }
}
