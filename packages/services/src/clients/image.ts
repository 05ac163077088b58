import { z } from "zod";
import { createChildLogger, errorMessage, sleep } from "@notes-to-blog/core";
import { CapabilityCallError, statusError, toCapabilityError } from "../errors.js";
import { withRetry, type RetryOptions } from "../retry.js";
import {
  fail,
  ok,
  type CallOptions,
  type CapabilityResult,
  type HealthReport,
  type ImageClient,
  type ImageDimensions,
  type ImagePayload,
} from "../types.js";

const logger = createChildLogger({ module: "services:image" });

const API_BASE = "https://api.replicate.com/v1";

const PredictionSchema = z.object({
  id: z.string(),
  status: z.enum(["starting", "processing", "succeeded", "failed", "canceled"]),
  output: z.union([z.string(), z.array(z.string()), z.null()]).optional(),
  error: z.unknown().optional(),
});

type Prediction = z.infer<typeof PredictionSchema>;

const MIME_EXTENSIONS: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/webp": "webp",
};

export interface ReplicateImageOptions {
  apiToken?: string;
  /** "owner/name:version" or "owner/name" for official models. */
  model: string;
  pollIntervalMs?: number;
  maxWaitMs?: number;
  retry?: Partial<RetryOptions>;
}

export class ReplicateImageClient implements ImageClient {
  readonly provider = "replicate";
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;

  constructor(private readonly options: ReplicateImageOptions) {
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.maxWaitMs = options.maxWaitMs ?? 300_000;
  }

  async generate(
    prompt: string,
    dimensions: ImageDimensions,
    options: CallOptions = {}
  ): Promise<CapabilityResult<ImagePayload>> {
    if (!this.options.apiToken) {
      return fail({ kind: "auth", message: "REPLICATE_API_TOKEN is not set" });
    }
    try {
      const payload = await withRetry(
        () => this.request(prompt, dimensions, options),
        "replicate",
        this.options.retry
      );
      return ok(payload);
    } catch (err) {
      const error = toCapabilityError(err);
      logger.warn({ kind: error.kind, error: error.message }, "Image generation failed");
      return fail(error);
    }
  }

  async healthCheck(): Promise<HealthReport> {
    if (!this.options.apiToken) {
      return { state: "unavailable", detail: "REPLICATE_API_TOKEN is not set" };
    }
    try {
      const response = await fetch(`${API_BASE}/account`, {
        headers: this.headers(),
        signal: AbortSignal.timeout(10_000),
      });
      if (response.ok) return { state: "available" };
      if (response.status === 429) return { state: "degraded", detail: "rate limited" };
      return { state: "unavailable", detail: `HTTP ${response.status}` };
    } catch (err) {
      return { state: "unavailable", detail: errorMessage(err) };
    }
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.options.apiToken ?? ""}`,
      "Content-Type": "application/json",
    };
  }

  private async request(
    prompt: string,
    dimensions: ImageDimensions,
    options: CallOptions
  ): Promise<ImagePayload> {
    const deadline = Date.now() + (options.timeoutMs ?? this.maxWaitMs);
    const remaining = () => Math.max(1, deadline - Date.now());

    const [model, version] = this.options.model.split(":");
    const url = version ? `${API_BASE}/predictions` : `${API_BASE}/models/${model}/predictions`;
    const input = { prompt, width: dimensions.width, height: dimensions.height, num_outputs: 1 };

    logger.debug({ model, promptLength: prompt.length }, "Creating prediction");

    const created = await this.fetchPrediction(url, {
      method: "POST",
      body: JSON.stringify(version ? { version, input } : { input }),
      signal: AbortSignal.timeout(remaining()),
    });

    const prediction = await this.waitForCompletion(created, deadline);
    const outputUrl = Array.isArray(prediction.output) ? prediction.output[0] : prediction.output;
    if (!outputUrl) {
      throw new CapabilityCallError("malformed", `Prediction ${prediction.id} returned no output`);
    }

    const download = await fetch(outputUrl, { signal: AbortSignal.timeout(remaining()) });
    if (!download.ok) {
      throw statusError("Replicate download", download.status, await download.text());
    }

    const contentType = (download.headers.get("content-type") ?? "").split(";")[0].trim();
    const known = MIME_EXTENSIONS[contentType];
    const extension = known ?? extensionFromUrl(outputUrl);
    const mimeType = known ? contentType : `image/${extension === "jpg" ? "jpeg" : extension}`;
    const data = new Uint8Array(await download.arrayBuffer());

    logger.debug({ predictionId: prediction.id, bytes: data.byteLength }, "Image downloaded");

    return {
      data,
      mimeType,
      extension,
      model: this.options.model,
    };
  }

  private async waitForCompletion(initial: Prediction, deadline: number): Promise<Prediction> {
    let prediction = initial;
    while (prediction.status === "starting" || prediction.status === "processing") {
      if (Date.now() >= deadline) {
        throw new CapabilityCallError("timeout", `Prediction ${prediction.id} did not finish in time`);
      }
      await sleep(this.pollIntervalMs);
      prediction = await this.fetchPrediction(`${API_BASE}/predictions/${prediction.id}`, {
        signal: AbortSignal.timeout(Math.max(1, deadline - Date.now())),
      });
    }

    if (prediction.status !== "succeeded") {
      const reason = typeof prediction.error === "string" ? prediction.error : prediction.status;
      throw new CapabilityCallError("http", `Prediction ${prediction.id} ${reason}`);
    }
    return prediction;
  }

  private async fetchPrediction(url: string, init: RequestInit): Promise<Prediction> {
    const response = await fetch(url, { ...init, headers: this.headers() });
    if (!response.ok) {
      throw statusError("Replicate", response.status, await response.text());
    }
    const parsed = PredictionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new CapabilityCallError("malformed", "Replicate returned an unexpected prediction shape");
    }
    return parsed.data;
  }
}

function extensionFromUrl(url: string): string {
  const match = /\.(png|jpe?g|webp)(?:\?|$)/i.exec(url);
  if (!match) return "png";
  const ext = match[1].toLowerCase();
  return ext === "jpeg" ? "jpg" : ext;
}
