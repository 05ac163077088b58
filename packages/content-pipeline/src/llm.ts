import { z } from "zod";
import {
  capabilityFailure,
  createChildLogger,
  unavailableDependency,
  type StageConfig,
} from "@notes-to-blog/core";
import {
  fail,
  ok,
  type CapabilityError,
  type CapabilityResult,
  type CompletionOptions,
  type LlmClient,
  type ServiceRegistry,
} from "@notes-to-blog/services";
import { fatal, recoverable, type StageFailureResult } from "./types.js";

const logger = createChildLogger({ module: "content-pipeline:llm" });

export interface TextCompletion {
  text: string;
  cost: number;
}

export interface JsonCompletion<T> {
  data: T;
  cost: number;
}

/**
 * Call the LLM and return trimmed text. An empty answer is reported
 * as a malformed response.
 */
export async function completeText(
  llm: LlmClient,
  prompt: string,
  options: CompletionOptions = {}
): Promise<CapabilityResult<TextCompletion>> {
  const result = await llm.complete(prompt, options);
  if (!result.ok) return result;

  const text = result.value.content.trim();
  if (!text) {
    return fail({ kind: "malformed", message: "LLM returned empty content" });
  }
  return ok({ text, cost: result.value.cost });
}

/**
 * Call the LLM and parse its JSON answer against `schema`.
 */
export async function completeJson<T>(
  llm: LlmClient,
  prompt: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: CompletionOptions = {}
): Promise<CapabilityResult<JsonCompletion<T>>> {
  const result = await llm.complete(prompt, { ...options, prefill: "{" });
  if (!result.ok) return result;

  const content = result.value.content;
  if (!content.trim()) {
    return fail({ kind: "malformed", message: "LLM returned empty content" });
  }

  // Extract JSON from response (handle markdown code blocks)
  const jsonMatch = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  const jsonStr = jsonMatch ? jsonMatch[1].trim() : content.trim();

  let raw: unknown;
  try {
    raw = parseJsonPermissive(jsonStr);
  } catch (err) {
    logger.warn(
      { preview: jsonStr.slice(0, 300), parseError: String(err) },
      "Failed to parse JSON from LLM response"
    );
    return fail({ kind: "malformed", message: `LLM response is not valid JSON: ${String(err)}` });
  }

  let parsed = schema.safeParse(raw);
  if (!parsed.success) {
    // LLMs often wrap responses in a container like {"outline": {...}}
    const unwrapped = unwrapSingleKeyObject(raw);
    if (unwrapped !== raw) parsed = schema.safeParse(unwrapped);
  }
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return fail({
      kind: "malformed",
      message: `LLM JSON has an unexpected shape: ${issue ? `${issue.path.join(".") || "(root)"} ${issue.message}` : "unknown"}`,
    });
  }

  return ok({ data: parsed.data, cost: result.value.cost });
}

/**
 * Parse JSON, handling trailing non-JSON content that LLMs sometimes append.
 * If strict JSON.parse fails, extract just the JSON object by tracking brace depth.
 */
export function parseJsonPermissive(str: string): unknown {
  try {
    return JSON.parse(str);
  } catch (err) {
    if (str.startsWith("{")) {
      let depth = 0;
      let inString = false;
      let escaped = false;
      for (let i = 0; i < str.length; i++) {
        const ch = str[i];
        if (escaped) {
          escaped = false;
          continue;
        }
        if (ch === "\\") {
          escaped = true;
          continue;
        }
        if (ch === '"') {
          inString = !inString;
          continue;
        }
        if (inString) continue;
        if (ch === "{") depth++;
        else if (ch === "}") {
          depth--;
          if (depth === 0) {
            return JSON.parse(str.slice(0, i + 1));
          }
        }
      }
    }
    throw err;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * If the parsed JSON is an object with a single key whose value is also an object,
 * unwrap it.
 */
export function unwrapSingleKeyObject(data: unknown): unknown {
  if (isRecord(data)) {
    const keys = Object.keys(data);
    if (keys.length === 1) {
      const inner = data[keys[0]];
      if (isRecord(inner)) return inner;
    }
  }
  return data;
}

/**
 * Fatal when the registry already knows the LLM is unavailable.
 */
export async function requireLlm(
  registry: ServiceRegistry
): Promise<LlmClient | StageFailureResult> {
  const status = await registry.status("llm");
  if (status.state === "unavailable") {
    return fatal(unavailableDependency("llm"));
  }
  return registry.get("llm");
}

export function isStageFailure(
  value: LlmClient | StageFailureResult
): value is StageFailureResult {
  return "status" in value;
}

/**
 * Map a failed LLM call onto the stage result taxonomy: a missing or
 * rejected provider stops the run, anything else is worth another attempt.
 */
export function llmFailure(error: CapabilityError, what: string): StageFailureResult {
  if (error.kind === "unavailable" || error.kind === "auth") {
    return fatal({ ...unavailableDependency("llm"), details: [error.message] });
  }
  return recoverable(capabilityFailure(`${what}: ${error.message}`));
}

export function callOptions(config: StageConfig, extra: CompletionOptions = {}): CompletionOptions {
  return { timeoutMs: config.perStageTimeoutMs, ...extra };
}

/** Appended to prompts when an earlier attempt was rejected. */
export function guidanceBlock(guidance: string | undefined): string {
  return guidance ? `\n\nYour previous answer was rejected: ${guidance}\nCorrect this in your new answer.` : "";
}
