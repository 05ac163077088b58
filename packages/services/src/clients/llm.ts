import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import { createChildLogger, env, errorMessage, type LlmProvider } from "@notes-to-blog/core";
import { CapabilityCallError, statusError, toCapabilityError } from "../errors.js";
import { RateLimiter, withRetry, type RetryOptions } from "../retry.js";
import {
  fail,
  ok,
  type CapabilityResult,
  type Completion,
  type CompletionOptions,
  type HealthReport,
  type LlmClient,
} from "../types.js";

const logger = createChildLogger({ module: "services:llm" });

const DEFAULT_ANTHROPIC_MODEL = "claude-sonnet-4-5-20250929";
const DEFAULT_OPENROUTER_MODEL = "openai/gpt-4o-mini";
const HEALTH_TIMEOUT_MS = 10_000;

// Rough pricing per 1M tokens (input/output)
const PRICING: Record<string, { input: number; output: number }> = {
  "claude-sonnet-4-5-20250929": { input: 3, output: 15 },
  "claude-haiku-4-5": { input: 1, output: 5 },
  "openai/gpt-4o-mini": { input: 0.15, output: 0.6 },
  "openai/gpt-4o": { input: 2.5, output: 10 },
};

function estimateCost(model: string, inputTokens: number, outputTokens: number): number {
  const pricing = PRICING[model] ?? { input: 3, output: 15 };
  return (inputTokens * pricing.input + outputTokens * pricing.output) / 1_000_000;
}

export interface LlmClientOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  requestsPerMinute?: number;
  retry?: Partial<RetryOptions>;
}

// ─── Anthropic ──────────────────────────────────────────────────────────────

export class AnthropicLlmClient implements LlmClient {
  readonly provider = "anthropic";
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly limiter: RateLimiter;

  constructor(private readonly options: LlmClientOptions = {}) {
    this.client = new Anthropic({
      apiKey: options.apiKey ?? "unused",
      baseURL: options.baseUrl,
      maxRetries: 0,
    });
    this.model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.limiter = new RateLimiter(options.requestsPerMinute ?? 60);
  }

  async complete(
    prompt: string,
    options: CompletionOptions = {}
  ): Promise<CapabilityResult<Completion>> {
    try {
      const completion = await withRetry(
        () => this.request(prompt, options),
        "anthropic",
        this.options.retry
      );
      return ok(completion);
    } catch (err) {
      const error = toCapabilityError(err);
      logger.warn({ model: this.model, kind: error.kind, error: error.message }, "Anthropic completion failed");
      return fail(error);
    }
  }

  async healthCheck(): Promise<HealthReport> {
    if (!this.options.apiKey && !this.options.baseUrl) {
      return { state: "unavailable", detail: "ANTHROPIC_API_KEY is not set" };
    }
    try {
      await this.client.models.list({ limit: 1 }, { timeout: HEALTH_TIMEOUT_MS });
      return { state: "available" };
    } catch (err) {
      const error = toCapabilityError(mapAnthropicError(err));
      return {
        state: error.kind === "rate_limited" ? "degraded" : "unavailable",
        detail: error.message,
      };
    }
  }

  private async request(prompt: string, options: CompletionOptions): Promise<Completion> {
    await this.limiter.acquire();

    const messages: Anthropic.MessageParam[] = [{ role: "user", content: prompt }];
    // Prefill forces the model to continue from a specific starting point
    if (options.prefill) {
      messages.push({ role: "assistant", content: options.prefill });
    }

    logger.debug({ model: this.model, promptLength: prompt.length }, "Calling Anthropic");

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: options.maxTokens ?? this.options.maxTokens ?? 4000,
          temperature: options.temperature ?? this.options.temperature ?? 0.7,
          ...(options.system ? { system: options.system } : {}),
          messages,
        },
        options.timeoutMs ? { timeout: options.timeoutMs } : undefined
      );
    } catch (err) {
      throw mapAnthropicError(err);
    }

    const rawContent = response.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("\n");
    const content = options.prefill ? options.prefill + rawContent : rawContent;

    const inputTokens = response.usage.input_tokens;
    const outputTokens = response.usage.output_tokens;
    const cost = estimateCost(this.model, inputTokens, outputTokens);

    logger.debug({ model: this.model, inputTokens, outputTokens, cost }, "Anthropic call complete");

    return { content, model: this.model, inputTokens, outputTokens, cost };
  }
}

function mapAnthropicError(err: unknown): unknown {
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new CapabilityCallError("timeout", err.message);
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new CapabilityCallError("network", err.message);
  }
  if (err instanceof Anthropic.APIError && err.status !== undefined) {
    return statusError("Anthropic", err.status, err.message);
  }
  return err;
}

// ─── OpenRouter (OpenAI-compatible) ─────────────────────────────────────────

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
    })
    .optional(),
});

export class OpenRouterLlmClient implements LlmClient {
  readonly provider = "openrouter";
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly limiter: RateLimiter;

  constructor(private readonly options: LlmClientOptions = {}) {
    this.model = options.model ?? DEFAULT_OPENROUTER_MODEL;
    this.baseUrl = (options.baseUrl ?? "https://openrouter.ai/api/v1").replace(/\/$/, "");
    this.limiter = new RateLimiter(options.requestsPerMinute ?? 60);
  }

  async complete(
    prompt: string,
    options: CompletionOptions = {}
  ): Promise<CapabilityResult<Completion>> {
    if (!this.options.apiKey) {
      return fail({ kind: "auth", message: "OPENROUTER_API_KEY is not set" });
    }
    try {
      const completion = await withRetry(
        () => this.request(prompt, options),
        "openrouter",
        this.options.retry
      );
      return ok(completion);
    } catch (err) {
      const error = toCapabilityError(err);
      logger.warn({ model: this.model, kind: error.kind, error: error.message }, "OpenRouter completion failed");
      return fail(error);
    }
  }

  async healthCheck(): Promise<HealthReport> {
    if (!this.options.apiKey) {
      return { state: "unavailable", detail: "OPENROUTER_API_KEY is not set" };
    }
    try {
      const response = await fetch(`${this.baseUrl}/models`, {
        headers: this.headers(),
        signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS),
      });
      if (response.ok) return { state: "available" };
      if (response.status === 429) {
        return { state: "degraded", detail: "rate limited" };
      }
      return { state: "unavailable", detail: `HTTP ${response.status}` };
    } catch (err) {
      return { state: "unavailable", detail: errorMessage(err) };
    }
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.options.apiKey ?? ""}`,
      "Content-Type": "application/json",
    };
  }

  private async request(prompt: string, options: CompletionOptions): Promise<Completion> {
    await this.limiter.acquire();

    const messages: Array<{ role: "system" | "user" | "assistant"; content: string }> = [];
    if (options.system) messages.push({ role: "system", content: options.system });
    messages.push({ role: "user", content: prompt });
    if (options.prefill) messages.push({ role: "assistant", content: options.prefill });

    logger.debug({ model: this.model, promptLength: prompt.length }, "Calling OpenRouter");

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify({
        model: this.model,
        messages,
        temperature: options.temperature ?? this.options.temperature ?? 0.7,
        max_tokens: options.maxTokens ?? this.options.maxTokens ?? 4000,
      }),
      signal: options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined,
    });

    if (!response.ok) {
      throw statusError("OpenRouter", response.status, await response.text());
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new CapabilityCallError(
        "malformed",
        `OpenRouter returned an unexpected response shape: ${parsed.error.issues[0]?.message ?? "unknown"}`
      );
    }

    const data = parsed.data;
    const rawContent = data.choices[0].message.content ?? "";
    const content = options.prefill && !rawContent.startsWith(options.prefill)
      ? options.prefill + rawContent
      : rawContent;
    const model = data.model ?? this.model;
    const inputTokens = data.usage?.prompt_tokens ?? 0;
    const outputTokens = data.usage?.completion_tokens ?? 0;
    const cost = estimateCost(model, inputTokens, outputTokens);

    logger.debug({ model, inputTokens, outputTokens, cost }, "OpenRouter call complete");

    return { content, model, inputTokens, outputTokens, cost };
  }
}

// ─── Provider selection ─────────────────────────────────────────────────────

function detectProvider(preferred: LlmProvider): "anthropic" | "openrouter" {
  if (preferred !== "auto") return preferred;
  if (env.anthropicApiKey || env.anthropicBaseUrl) return "anthropic";
  if (env.openRouterApiKey) return "openrouter";
  // Nothing configured: the registry health check will report it unavailable
  return "anthropic";
}

export function createLlmClient(
  provider: LlmProvider,
  options: Omit<LlmClientOptions, "apiKey" | "baseUrl">
): LlmClient {
  if (detectProvider(provider) === "openrouter") {
    return new OpenRouterLlmClient({
      ...options,
      apiKey: env.openRouterApiKey,
      baseUrl: env.openRouterBaseUrl,
    });
  }
  return new AnthropicLlmClient({
    ...options,
    apiKey: env.anthropicApiKey,
    baseUrl: env.anthropicBaseUrl,
  });
}
