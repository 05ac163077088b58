import { z } from "zod";

// ─── Results ────────────────────────────────────────────────────────────────

export type CapabilityErrorKind =
  | "timeout"
  | "network"
  | "http"
  | "rate_limited"
  | "auth"
  | "malformed"
  | "unavailable";

export interface CapabilityError {
  kind: CapabilityErrorKind;
  message: string;
  status?: number;
}

/**
 * What every capability client returns. Raw provider responses never
 * leave the client: they are validated and mapped into `value` first.
 */
export type CapabilityResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: CapabilityError };

export function ok<T>(value: T): CapabilityResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: CapabilityError): CapabilityResult<T> {
  return { ok: false, error };
}

// ─── Health ─────────────────────────────────────────────────────────────────

export type ServiceState = "available" | "degraded" | "unavailable";

export interface HealthReport {
  state: ServiceState;
  detail?: string;
}

export interface CallOptions {
  timeoutMs?: number;
}

// ─── LLM completion ─────────────────────────────────────────────────────────

export interface CompletionOptions extends CallOptions {
  system?: string;
  maxTokens?: number;
  temperature?: number;
  /** Text the response is forced to start with (kept in `content`). */
  prefill?: string;
}

export interface Completion {
  content: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  cost: number;
}

export interface LlmClient {
  readonly provider: string;
  complete(
    prompt: string,
    options?: CompletionOptions
  ): Promise<CapabilityResult<Completion>>;
  healthCheck(): Promise<HealthReport>;
}

// ─── Web search ─────────────────────────────────────────────────────────────

export const SearchHitSchema = z.object({
  title: z.string(),
  url: z.string(),
  snippet: z.string(),
});

export type SearchHit = z.infer<typeof SearchHitSchema>;

export interface SearchClient {
  readonly provider: string;
  search(
    query: string,
    maxResults: number,
    options?: CallOptions
  ): Promise<CapabilityResult<SearchHit[]>>;
  healthCheck(): Promise<HealthReport>;
}

// ─── Image synthesis ────────────────────────────────────────────────────────

export interface ImageDimensions {
  width: number;
  height: number;
}

export interface ImagePayload {
  data: Uint8Array;
  mimeType: string;
  extension: string;
  model: string;
}

export interface ImageClient {
  readonly provider: string;
  generate(
    prompt: string,
    dimensions: ImageDimensions,
    options?: CallOptions
  ): Promise<CapabilityResult<ImagePayload>>;
  healthCheck(): Promise<HealthReport>;
}
