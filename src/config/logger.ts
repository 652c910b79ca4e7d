import fetch from "node-fetch";
import { LogLevel } from "./env";

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export type WebhookSender = (url: string, text: string) => Promise<void>;

export interface CreateLoggerOptions {
  minLevel?: LogLevel;
  write?: (line: string) => void;
  webhook?: {
    url?: string;
    minLevel: LogLevel;
    ratePerMinute: number;
    batchMs: number;
    send?: WebhookSender;
  };
}

export interface MatchingLogContext {
  candidate_id?: string;
  pipeline?: "content" | "jobs";
  stage?: string;
  target_id?: string;
  prompt_name?: string;
  model_name?: string;
  latency_ms?: number;
  ok?: boolean;
  error_code?: string;
}

export interface SinkEntry {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
  timestamp: string;
}

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

function log(
  level: LogLevel,
  message: string,
  meta: Record<string, unknown> | undefined,
  write: (line: string) => void,
  sink?: WebhookLogSink,
): void {
  const timestamp = new Date().toISOString();
  const payload: Record<string, unknown> = {
    timestamp,
    level,
    message,
  };
  if (meta) {
    payload.meta = meta;
  }
  write(`${safeJson(payload)}\n`);
  sink?.enqueue({
    level,
    message,
    meta,
    timestamp,
  });
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const minLevel = options?.minLevel ?? "debug";
  const write = options?.write ?? ((line: string) => process.stdout.write(line));
  const sink = buildWebhookLogSink(options?.webhook);
  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (!isAtLeast(level, minLevel)) {
      return;
    }
    log(level, message, meta, write, sink);
  };
  return {
    debug(message, meta) {
      emit("debug", message, meta);
    },
    info(message, meta) {
      emit("info", message, meta);
    },
    warn(message, meta) {
      emit("warn", message, meta);
    },
    error(message, meta) {
      emit("error", message, meta);
    },
  };
}

export function logContext(
  logger: Logger,
  level: LogLevel,
  message: string,
  context: MatchingLogContext,
  fields?: Record<string, unknown>,
): void {
  const meta: Record<string, unknown> = {
    ...context,
    ...(fields ?? {}),
  };

  if (level === "debug") {
    logger.debug(message, meta);
    return;
  }
  if (level === "warn") {
    logger.warn(message, meta);
    return;
  }
  if (level === "error") {
    logger.error(message, meta);
    return;
  }
  logger.info(message, meta);
}

export class WebhookLogSink {
  private readonly queue: SinkEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private windowStartMs = Date.now();
  private sentInWindow = 0;

  constructor(
    private readonly url: string,
    private readonly minLevel: LogLevel,
    private readonly ratePerMinute: number,
    private readonly batchMs: number,
    private readonly send: WebhookSender,
  ) {}

  enqueue(entry: SinkEntry): void {
    if (!isAtLeast(entry.level, this.minLevel)) {
      return;
    }
    this.queue.push(entry);
    this.scheduleFlush();
  }

  pending(): number {
    return this.queue.length;
  }

  async flush(): Promise<void> {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    if (!this.queue.length) {
      return;
    }
    if (!this.tryConsumeRateWindow()) {
      this.scheduleFlush();
      return;
    }

    const batch = this.queue.splice(0, 5);
    const text = formatLogBatch(batch);
    try {
      await this.send(this.url, text);
    } catch (error) {
      process.stderr.write(
        `${safeJson({ level: "error", message: "log.webhook.send_failed", error: error instanceof Error ? error.message : "Unknown error" })}\n`,
      );
    } finally {
      if (this.queue.length) {
        this.scheduleFlush();
      }
    }
  }

  private scheduleFlush(): void {
    if (this.flushTimer) {
      return;
    }
    this.flushTimer = setTimeout(() => {
      void this.flush();
    }, this.batchMs);
    this.flushTimer.unref();
  }

  private tryConsumeRateWindow(): boolean {
    const now = Date.now();
    if (now - this.windowStartMs >= 60_000) {
      this.windowStartMs = now;
      this.sentInWindow = 0;
    }
    if (this.sentInWindow >= this.ratePerMinute) {
      return false;
    }
    this.sentInWindow += 1;
    return true;
  }
}

function buildWebhookLogSink(config: CreateLoggerOptions["webhook"] | undefined): WebhookLogSink | undefined {
  const url = config?.url?.trim();
  if (!config || !url) {
    return undefined;
  }
  return new WebhookLogSink(
    url,
    config.minLevel,
    Math.max(1, Math.floor(config.ratePerMinute)),
    Math.max(300, Math.floor(config.batchMs)),
    config.send ?? postToWebhook,
  );
}

function isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
}

export function formatLogBatch(entries: SinkEntry[]): string {
  const blocks = entries.map((entry) => {
    const redactedMeta = entry.meta ? redactMeta(entry.meta) : undefined;
    const metaText = redactedMeta ? `\nmeta: ${safeJson(redactedMeta)}` : "";
    return `[${entry.level.toUpperCase()}] ${entry.timestamp}\n${entry.message}${metaText}`;
  });
  return truncateMessage(blocks.join("\n\n---\n\n"), 3800);
}

export function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (
      lowerKey.includes("token") ||
      lowerKey.includes("secret") ||
      lowerKey.includes("apikey") ||
      lowerKey.includes("api_key") ||
      lowerKey.includes("authorization")
    ) {
      output[key] = "[REDACTED]";
      continue;
    }
    if (typeof value === "string" && value.length > 500) {
      output[key] = `${value.slice(0, 500)}...`;
      continue;
    }
    output[key] = value;
  }
  return output;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "\"[unserializable]\"";
  }
}

function truncateMessage(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars - 3)}...`;
}

async function postToWebhook(url: string, text: string): Promise<void> {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "content-type": "application/json",
    },
    body: JSON.stringify({ text }),
  });
  if (!response.ok) {
    throw new Error(`log_webhook_send_failed_http_${response.status}`);
  }
}
