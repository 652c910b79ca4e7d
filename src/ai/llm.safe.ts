import { Logger } from "../config/logger";
import { normalizeTimeout, TimeoutError, withTimeout } from "../shared/utils/timeout";
import { StructuredJsonClient } from "./llm.client";
import { buildJsonRepairV1Prompt } from "./prompts/utils/json-repair.v1.prompt";

export interface JsonSafeCallArgs<T> {
  llmClient: StructuredJsonClient;
  prompt: string;
  maxTokens: number;
  promptName: string;
  schemaHint: string;
  logger?: Logger;
  timeoutMs?: number;
  retryTransient?: boolean;
  repairMalformed?: boolean;
  validate: (value: Record<string, unknown>) => value is Record<string, unknown> & T;
}

export type SafeJsonErrorCode =
  | "timeout"
  | "transient_failure"
  | "llm_failure"
  | "json_parse_failed"
  | "schema_invalid";

export type SafeJsonResult<T> =
  | {
      ok: true;
      data: T;
    }
  | {
      ok: false;
      error_code: SafeJsonErrorCode;
      raw?: string;
    };

type AttemptResult =
  | { ok: true; raw: string }
  | { ok: false; error_code: "timeout" | "transient_failure" | "llm_failure" };

export const DEFAULT_LLM_TIMEOUT_MS = 25_000;

export async function callJsonPromptSafe<T>(args: JsonSafeCallArgs<T>): Promise<SafeJsonResult<T>> {
  const timeoutMs = normalizeTimeout(args.timeoutMs, DEFAULT_LLM_TIMEOUT_MS);
  const initial = await attemptJsonCall(args, args.prompt, args.maxTokens, args.promptName, timeoutMs);
  if (!initial.ok) {
    return initial;
  }

  const parsed = parseJsonObject(initial.raw);
  if (parsed.ok) {
    return validateParsed(args, parsed.data, initial.raw);
  }
  if (args.repairMalformed === false) {
    return { ok: false, error_code: "json_parse_failed", raw: initial.raw };
  }

  const repairPrompt = buildJsonRepairV1Prompt({
    schemaHint: args.schemaHint,
    raw: initial.raw,
  });
  const repaired = await attemptJsonCall(
    args,
    repairPrompt,
    Math.max(240, Math.min(2400, args.maxTokens)),
    `${args.promptName}_json_repair`,
    timeoutMs,
  );
  if (!repaired.ok) {
    return repaired;
  }
  const repairedParsed = parseJsonObject(repaired.raw);
  if (!repairedParsed.ok) {
    return { ok: false, error_code: "json_parse_failed", raw: repaired.raw };
  }
  return validateParsed(args, repairedParsed.data, repaired.raw);
}

function validateParsed<T>(
  args: JsonSafeCallArgs<T>,
  data: Record<string, unknown>,
  raw: string,
): SafeJsonResult<T> {
  if (!args.validate(data)) {
    return { ok: false, error_code: "schema_invalid", raw };
  }
  return { ok: true, data };
}

async function attemptJsonCall<T>(
  args: JsonSafeCallArgs<T>,
  prompt: string,
  maxTokens: number,
  promptName: string,
  timeoutMs: number,
): Promise<AttemptResult> {
  const attempt = async (): Promise<string> =>
    withTimeout(args.llmClient.generateStructuredJson(prompt, maxTokens, { promptName }), timeoutMs);

  try {
    return { ok: true, raw: await attempt() };
  } catch (error) {
    if (!isTransientError(error) || args.retryTransient === false) {
      return {
        ok: false,
        error_code: isTimeoutError(error) ? "timeout" : isTransientError(error) ? "transient_failure" : "llm_failure",
      };
    }
  }

  args.logger?.warn("llm.safe.retry.once", {
    promptName,
    modelName: args.llmClient.getModelName?.(),
  });
  try {
    return { ok: true, raw: await attempt() };
  } catch (error) {
    return {
      ok: false,
      error_code: isTimeoutError(error)
        ? "timeout"
        : isTransientError(error)
          ? "transient_failure"
          : "llm_failure",
    };
  }
}

const FENCE_PATTERN = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/;

export function parseJsonObject(raw: string): { ok: true; data: Record<string, unknown> } | { ok: false } {
  let text = raw.trim();
  const fenced = FENCE_PATTERN.exec(text);
  if (fenced) {
    text = fenced[1].trim();
  }
  if (!text.startsWith("{") || !text.endsWith("}")) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (!isRecord(parsed)) {
      return { ok: false };
    }
    return { ok: true, data: parsed };
  } catch {
    return { ok: false };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTimeoutError(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout");
}

function isTransientError(error: unknown): boolean {
  if (isTimeoutError(error)) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("econnreset") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("http 500") ||
    message.includes("http 502") ||
    message.includes("http 503") ||
    message.includes("http 504")
  );
}
