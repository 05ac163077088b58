import { z } from "zod";
import { createChildLogger } from "@notes-to-blog/core";
import { CapabilityCallError, statusError, toCapabilityError } from "../errors.js";
import { withRetry, type RetryOptions } from "../retry.js";
import {
  fail,
  ok,
  type CallOptions,
  type CapabilityResult,
  type HealthReport,
  type SearchClient,
  type SearchHit,
} from "../types.js";

const logger = createChildLogger({ module: "services:search" });

const BraveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().default(""),
            url: z.string(),
            description: z.string().default(""),
          })
        )
        .default([]),
    })
    .optional(),
});

export interface BraveSearchOptions {
  apiKey?: string;
  endpoint?: string;
  country?: string;
  safesearch?: "off" | "moderate" | "strict";
  retry?: Partial<RetryOptions>;
}

export class BraveSearchClient implements SearchClient {
  readonly provider = "brave";
  private readonly endpoint: string;

  constructor(private readonly options: BraveSearchOptions = {}) {
    this.endpoint = options.endpoint ?? "https://api.search.brave.com/res/v1/web/search";
  }

  async search(
    query: string,
    maxResults: number,
    options: CallOptions = {}
  ): Promise<CapabilityResult<SearchHit[]>> {
    if (!this.options.apiKey) {
      return fail({ kind: "auth", message: "BRAVE_API_KEY is not set" });
    }
    try {
      const hits = await withRetry(
        () => this.request(query, maxResults, options),
        "brave-search",
        this.options.retry
      );
      logger.debug({ query, hitCount: hits.length }, "Search complete");
      return ok(hits);
    } catch (err) {
      const error = toCapabilityError(err);
      logger.warn({ query, kind: error.kind, error: error.message }, "Search failed");
      return fail(error);
    }
  }

  async healthCheck(): Promise<HealthReport> {
    if (!this.options.apiKey) {
      return { state: "unavailable", detail: "BRAVE_API_KEY is not set" };
    }
    const result = await this.search("health check", 1, { timeoutMs: 10_000 });
    if (result.ok) return { state: "available" };
    return {
      state: result.error.kind === "rate_limited" ? "degraded" : "unavailable",
      detail: result.error.message,
    };
  }

  private async request(
    query: string,
    maxResults: number,
    options: CallOptions
  ): Promise<SearchHit[]> {
    const params = new URLSearchParams({
      q: query,
      count: String(Math.min(Math.max(maxResults, 1), 20)),
      safesearch: this.options.safesearch ?? "moderate",
      country: this.options.country ?? "us",
      result_filter: "web",
    });

    const response = await fetch(`${this.endpoint}?${params.toString()}`, {
      headers: {
        Accept: "application/json",
        "X-Subscription-Token": this.options.apiKey ?? "",
      },
      signal: options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined,
    });

    if (!response.ok) {
      throw statusError("Brave Search", response.status, await response.text());
    }

    const parsed = BraveResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new CapabilityCallError("malformed", "Brave Search returned an unexpected response shape");
    }

    return (parsed.data.web?.results ?? []).slice(0, maxResults).map((r) => ({
      title: stripTags(r.title),
      url: r.url,
      snippet: stripTags(r.description),
    }));
  }
}

/**
 * Brave highlights matches with <strong> tags and escapes entities.
 */
export function stripTags(text: string): string {
  return text
    .replace(/<[^>]+>/g, "")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&")
    .trim();
}
