import dotenv from "dotenv";

dotenv.config();

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface EnvConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  logWebhookUrl?: string;
  logWebhookLevel: LogLevel;
  logWebhookRatePerMin: number;
  logWebhookBatchMs: number;
  openaiApiKey: string;
  openaiChatModel: string;
  openaiEmbeddingModel: string;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  qdrantPassageCollection: string;
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;
  contentMatchThreshold: number;
  contentPoolSize: number;
  contentFinalCount: number;
  contentRerankEnabled: boolean;
  contentMultiField: boolean;
  diversityExcludedMarkers: string[];
  jobMatchThreshold: number;
  jobReviewCap: number;
  jobFinalCap: number;
  gatewayTimeoutMs: number;
  matchingConcurrency: number;
  passageFanout: number;
}

export const DEFAULT_EXCLUDED_MARKERS = ["career", "team", "culture", "life at", "meet the engineers"];

type EnvSource = Record<string, string | undefined>;

function getRequiredString(source: EnvSource, name: string): string {
  const value = source[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return trimmed;
}

function getOptionalTrimmed(source: EnvSource, name: string): string | undefined {
  const value = source[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const contentThresholdRaw = source.CONTENT_MATCH_THRESHOLD ?? "0.25";
  const contentPoolSizeRaw = source.CONTENT_POOL_SIZE ?? "30";
  const contentFinalCountRaw = source.CONTENT_FINAL_COUNT ?? "3";
  const contentRerankEnabledRaw = source.CONTENT_RERANK_ENABLED ?? "true";
  const contentMultiFieldRaw = source.CONTENT_MULTI_FIELD ?? "true";
  const jobThresholdRaw = source.JOB_MATCH_THRESHOLD ?? "0.35";
  const jobReviewCapRaw = source.JOB_REVIEW_CAP ?? "5";
  const jobFinalCapRaw = source.JOB_FINAL_CAP ?? "3";
  const gatewayTimeoutRaw = source.GATEWAY_TIMEOUT_MS ?? "25000";
  const concurrencyRaw = source.MATCHING_CONCURRENCY ?? "4";
  const passageFanoutRaw = source.PASSAGE_FANOUT ?? "5";
  const logLevelRaw = (source.LOG_LEVEL ?? "info").trim().toLowerCase();
  const logWebhookLevelRaw = (source.LOG_WEBHOOK_LEVEL ?? "warn").trim().toLowerCase();
  const logWebhookRatePerMinRaw = source.LOG_WEBHOOK_RATE_PER_MIN ?? "20";
  const logWebhookBatchMsRaw = source.LOG_WEBHOOK_BATCH_MS ?? "2500";

  const contentMatchThreshold = Number(contentThresholdRaw);
  const contentPoolSize = Number(contentPoolSizeRaw);
  const contentFinalCount = Number(contentFinalCountRaw);
  const jobMatchThreshold = Number(jobThresholdRaw);
  const jobReviewCap = Number(jobReviewCapRaw);
  const jobFinalCap = Number(jobFinalCapRaw);
  const gatewayTimeoutMs = Number(gatewayTimeoutRaw);
  const matchingConcurrency = Number(concurrencyRaw);
  const passageFanout = Number(passageFanoutRaw);
  const logWebhookRatePerMin = Number(logWebhookRatePerMinRaw);
  const logWebhookBatchMs = Number(logWebhookBatchMsRaw);

  if (!isUnitInterval(contentMatchThreshold)) {
    throw new Error(
      `Invalid CONTENT_MATCH_THRESHOLD value: ${contentThresholdRaw}. Expected number between 0 and 1.`,
    );
  }
  if (!isUnitInterval(jobMatchThreshold)) {
    throw new Error(`Invalid JOB_MATCH_THRESHOLD value: ${jobThresholdRaw}. Expected number between 0 and 1.`);
  }
  if (!isPositiveInteger(contentPoolSize)) {
    throw new Error(`Invalid CONTENT_POOL_SIZE value: ${contentPoolSizeRaw}`);
  }
  if (!isPositiveInteger(contentFinalCount)) {
    throw new Error(`Invalid CONTENT_FINAL_COUNT value: ${contentFinalCountRaw}`);
  }
  if (!isPositiveInteger(jobReviewCap)) {
    throw new Error(`Invalid JOB_REVIEW_CAP value: ${jobReviewCapRaw}`);
  }
  if (!isPositiveInteger(jobFinalCap)) {
    throw new Error(`Invalid JOB_FINAL_CAP value: ${jobFinalCapRaw}`);
  }
  if (!isPositiveInteger(gatewayTimeoutMs) || gatewayTimeoutMs < 100) {
    throw new Error(`Invalid GATEWAY_TIMEOUT_MS value: ${gatewayTimeoutRaw}`);
  }
  if (!isPositiveInteger(matchingConcurrency) || matchingConcurrency > 64) {
    throw new Error(`Invalid MATCHING_CONCURRENCY value: ${concurrencyRaw}`);
  }
  if (!isPositiveInteger(passageFanout)) {
    throw new Error(`Invalid PASSAGE_FANOUT value: ${passageFanoutRaw}`);
  }
  if (!Number.isFinite(logWebhookRatePerMin) || logWebhookRatePerMin < 1) {
    throw new Error(`Invalid LOG_WEBHOOK_RATE_PER_MIN value: ${logWebhookRatePerMinRaw}`);
  }
  if (!Number.isFinite(logWebhookBatchMs) || logWebhookBatchMs < 250) {
    throw new Error(`Invalid LOG_WEBHOOK_BATCH_MS value: ${logWebhookBatchMsRaw}`);
  }

  return {
    nodeEnv: source.NODE_ENV ?? "development",
    logLevel: parseLogLevel("LOG_LEVEL", logLevelRaw),
    logWebhookUrl: getOptionalTrimmed(source, "LOG_WEBHOOK_URL"),
    logWebhookLevel: parseLogLevel("LOG_WEBHOOK_LEVEL", logWebhookLevelRaw),
    logWebhookRatePerMin,
    logWebhookBatchMs,
    openaiApiKey: getRequiredString(source, "OPENAI_API_KEY"),
    openaiChatModel: getOptionalTrimmed(source, "OPENAI_CHAT_MODEL") ?? "gpt-4o-mini",
    openaiEmbeddingModel:
      getOptionalTrimmed(source, "OPENAI_EMBEDDINGS_MODEL") ??
      getOptionalTrimmed(source, "OPENAI_EMBEDDING_MODEL") ??
      "text-embedding-3-small",
    qdrantUrl: getOptionalTrimmed(source, "QDRANT_URL"),
    qdrantApiKey: getOptionalTrimmed(source, "QDRANT_API_KEY"),
    qdrantPassageCollection: getOptionalTrimmed(source, "QDRANT_PASSAGE_COLLECTION") ?? "blog_passages_v1",
    supabaseUrl: getOptionalTrimmed(source, "SUPABASE_URL"),
    supabaseServiceRoleKey: getOptionalTrimmed(source, "SUPABASE_SERVICE_ROLE_KEY"),
    contentMatchThreshold,
    contentPoolSize,
    contentFinalCount,
    contentRerankEnabled: parseBoolean(contentRerankEnabledRaw),
    contentMultiField: parseBoolean(contentMultiFieldRaw),
    diversityExcludedMarkers: parseMarkers(source.DIVERSITY_EXCLUDED_MARKERS),
    jobMatchThreshold,
    jobReviewCap,
    jobFinalCap,
    gatewayTimeoutMs,
    matchingConcurrency,
    passageFanout,
  };
}

function parseMarkers(rawValue: string | undefined): string[] {
  if (rawValue === undefined) {
    return [...DEFAULT_EXCLUDED_MARKERS];
  }
  const values = rawValue
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return Array.from(new Set(values));
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  throw new Error(`Invalid boolean value: ${value}`);
}

function parseLogLevel(name: string, value: string): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  throw new Error(`Invalid ${name} value: ${value}`);
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
