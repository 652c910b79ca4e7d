import { EmbeddingsClient } from "./ai/embeddings.client";
import { LlmClient } from "./ai/llm.client";
import { EnvConfig } from "./config/env";
import { createLogger, Logger } from "./config/logger";
import { BlogPostsRepository } from "./db/repositories/blog-posts.repo";
import { CandidatesRepository } from "./db/repositories/candidates.repo";
import { JobPostingsRepository } from "./db/repositories/job-postings.repo";
import { SupabaseRestClient } from "./db/supabase.client";
import { DocumentRetriever } from "./matching/document-retriever";
import { TwoStageEligibilityMatcher } from "./matching/eligibility-matcher";
import { FallbackSimilarityGateway } from "./matching/fallback-similarity.gateway";
import { LlmJudgmentGateway } from "./matching/llm-judgment.gateway";
import { MatchingEngine } from "./matching/matching.engine";
import { QdrantClient } from "./matching/qdrant.client";
import { HybridReranker } from "./matching/rerank.service";
import { SimilarityGateway } from "./matching/similarity.gateway";
import { SupabaseSimilarityGateway } from "./matching/supabase-similarity.gateway";
import { HttpFetch } from "./shared/types/http.types";

export interface AppContext {
  engine: MatchingEngine;
  logger: Logger;
  candidatesRepository: CandidatesRepository;
  jobPostingsRepository: JobPostingsRepository;
}

export interface CreateAppOverrides {
  logger?: Logger;
  fetchImpl?: HttpFetch;
  similarityGateways?: SimilarityGateway[];
}

export function createApp(env: EnvConfig, overrides: CreateAppOverrides = {}): AppContext {
  const logger =
    overrides.logger ??
    createLogger({
      minLevel: env.logLevel,
      webhook: {
        url: env.logWebhookUrl,
        minLevel: env.logWebhookLevel,
        ratePerMinute: env.logWebhookRatePerMin,
        batchMs: env.logWebhookBatchMs,
      },
    });

  const llmClient = new LlmClient(env.openaiApiKey, logger, env.openaiChatModel, overrides.fetchImpl);
  const embeddingsClient = new EmbeddingsClient(env.openaiApiKey, env.openaiEmbeddingModel, overrides.fetchImpl);
  const supabaseClient =
    env.supabaseUrl && env.supabaseServiceRoleKey
      ? new SupabaseRestClient(
          {
            url: env.supabaseUrl,
            serviceRoleKey: env.supabaseServiceRoleKey,
          },
          overrides.fetchImpl,
        )
      : undefined;
  const qdrantClient = new QdrantClient(
    {
      baseUrl: env.qdrantUrl,
      apiKey: env.qdrantApiKey,
      passageCollection: env.qdrantPassageCollection,
    },
    logger,
    overrides.fetchImpl,
  );
  logger.info("Qdrant vector search", {
    enabled: qdrantClient.isEnabled(),
    collection: env.qdrantPassageCollection,
  });
  logger.info("Supabase", { enabled: Boolean(supabaseClient) });

  const gateways: SimilarityGateway[] = overrides.similarityGateways ?? [];
  if (!overrides.similarityGateways) {
    if (qdrantClient.isEnabled()) {
      gateways.push(qdrantClient);
    }
    if (supabaseClient) {
      gateways.push(new SupabaseSimilarityGateway(supabaseClient));
    }
  }
  if (!gateways.length) {
    logger.warn("No similarity gateway configured, content retrieval will return no matches");
  }

  const similarityGateway = new FallbackSimilarityGateway(gateways, logger);
  const judgmentGateway = new LlmJudgmentGateway(llmClient, logger);
  const candidatesRepository = new CandidatesRepository(logger, supabaseClient);
  const jobPostingsRepository = new JobPostingsRepository(logger, supabaseClient);
  const blogPostsRepository = new BlogPostsRepository(logger, supabaseClient);

  const engine = new MatchingEngine(
    new DocumentRetriever(similarityGateway, logger, {
      passageFanout: env.passageFanout,
      timeoutMs: env.gatewayTimeoutMs,
    }),
    new HybridReranker(judgmentGateway, logger, env.gatewayTimeoutMs),
    new TwoStageEligibilityMatcher(judgmentGateway, logger, embeddingsClient, {
      timeoutMs: env.gatewayTimeoutMs,
      concurrency: env.matchingConcurrency,
    }),
    logger,
    {
      contentThreshold: env.contentMatchThreshold,
      contentPoolSize: env.contentPoolSize,
      contentFinalCount: env.contentFinalCount,
      contentRerankEnabled: env.contentRerankEnabled,
      contentMultiField: env.contentMultiField,
      excludedMarkers: env.diversityExcludedMarkers,
      jobThreshold: env.jobMatchThreshold,
      jobReviewCap: env.jobReviewCap,
      jobFinalCap: env.jobFinalCap,
      timeoutMs: env.gatewayTimeoutMs,
      concurrency: env.matchingConcurrency,
    },
    {
      profiles: candidatesRepository,
      targets: jobPostingsRepository,
      documents: blogPostsRepository,
    },
  );

  return {
    engine,
    logger,
    candidatesRepository,
    jobPostingsRepository,
  };
}
