export { createApp } from "./app";
export type { AppContext, CreateAppOverrides } from "./app";
export { loadEnv, DEFAULT_EXCLUDED_MARKERS } from "./config/env";
export type { EnvConfig, LogLevel } from "./config/env";
export { createLogger, noopLogger } from "./config/logger";
export type { Logger } from "./config/logger";
export * from "./shared/errors";
export * from "./shared/types/matching.types";
export type { SimilarityGateway, SimilaritySearchInput } from "./matching/similarity.gateway";
export type { JudgmentGateway, SelectIndicesInput, JudgeInput, AttributedJudgment } from "./matching/judgment.gateway";
export { QdrantClient } from "./matching/qdrant.client";
export { SupabaseSimilarityGateway } from "./matching/supabase-similarity.gateway";
export { VectorSearchRepository, cosineSimilarity } from "./matching/vector-search.repo";
export { FallbackSimilarityGateway } from "./matching/fallback-similarity.gateway";
export { LlmJudgmentGateway } from "./matching/llm-judgment.gateway";
export { DocumentRetriever, selectPrimaryVector } from "./matching/document-retriever";
export { filterDiverse } from "./matching/diversity-filter";
export { HybridReranker } from "./matching/rerank.service";
export { TwoStageEligibilityMatcher, buildTargetEmbeddingText } from "./matching/eligibility-matcher";
export type { EligibilityOptions, EligibilityRunResult } from "./matching/eligibility-matcher";
export { applyPinnedDocuments } from "./matching/pinned-documents";
export type { DocumentLookup } from "./matching/pinned-documents";
export { MatchingEngine } from "./matching/matching.engine";
export type { MatchingEngineConfig } from "./matching/matching.engine";
