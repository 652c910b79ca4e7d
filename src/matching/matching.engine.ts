import { Logger, logContext } from "../config/logger";
import { CandidateProfile, EligibilityTarget, Match } from "../shared/types/matching.types";
import { filterDiverse } from "./diversity-filter";
import { DocumentRetriever } from "./document-retriever";
import { EligibilityRunResult, TwoStageEligibilityMatcher } from "./eligibility-matcher";
import { applyPinnedDocuments, DocumentLookup } from "./pinned-documents";
import { HybridReranker } from "./rerank.service";

export interface MatchingEngineConfig {
  contentThreshold: number;
  contentPoolSize: number;
  contentFinalCount: number;
  contentRerankEnabled: boolean;
  contentMultiField: boolean;
  excludedMarkers: string[];
  jobThreshold: number;
  jobReviewCap: number;
  jobFinalCap: number;
  timeoutMs: number;
  concurrency: number;
}

export interface ContentRecommendationOptions {
  finalCount?: number;
  rerank?: boolean;
  timeoutMs?: number;
}

export interface JobRecommendationOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CandidateProfileSource {
  getCandidateProfile(candidateId: string): Promise<CandidateProfile | null>;
}

export interface EligibilityTargetSource {
  listActiveTargets(limit?: number): Promise<EligibilityTarget[]>;
}

export interface CandidateRecommendations {
  candidateId: string;
  content: Match[];
  jobs: EligibilityRunResult;
}

export interface MatchingEngineSources {
  profiles?: CandidateProfileSource;
  targets?: EligibilityTargetSource;
  documents?: DocumentLookup;
}

export class MatchingEngine {
  constructor(
    private readonly retriever: DocumentRetriever,
    private readonly reranker: HybridReranker,
    private readonly eligibilityMatcher: TwoStageEligibilityMatcher,
    private readonly logger: Logger,
    private readonly config: MatchingEngineConfig,
    private readonly sources: MatchingEngineSources = {},
  ) {}

  async recommendContent(profile: CandidateProfile, options?: ContentRecommendationOptions): Promise<Match[]> {
    const finalCount = options?.finalCount ?? this.config.contentFinalCount;
    const context = { candidate_id: profile.candidateId, pipeline: "content" as const };
    const startedAt = Date.now();

    const retrieved = this.config.contentMultiField
      ? await this.retriever.retrieveMultiField(profile, this.config.contentThreshold, this.config.contentPoolSize)
      : await this.retriever.retrieveForProfile(profile, this.config.contentThreshold, this.config.contentPoolSize);
    const pool = await this.hydrateDocuments(retrieved);
    const pinned = profile.pinnedDocuments ?? [];
    if (!pool.length && !pinned.length) {
      logContext(this.logger, "info", "No content matched candidate", { ...context, stage: "retrieval" });
      return [];
    }

    const useRerank = options?.rerank ?? this.config.contentRerankEnabled;
    const ranked = useRerank
      ? await this.reranker.rerank(profile, pool, finalCount, { timeoutMs: options?.timeoutMs ?? this.config.timeoutMs })
      : filterDiverse(pool, finalCount, this.config.excludedMarkers);

    const selection = await applyPinnedDocuments(ranked, pinned, finalCount, {
      pool,
      lookup: this.sources.documents,
      logger: this.logger,
    });

    logContext(this.logger, "info", "Content recommendation completed", { ...context, stage: "selection" }, {
      poolSize: pool.length,
      reranked: useRerank,
      pinned: pinned.length,
      selected: selection.length,
      latencyMs: Date.now() - startedAt,
    });
    return selection;
  }

  async recommendJobs(
    profile: CandidateProfile,
    targets: ReadonlyArray<EligibilityTarget>,
    options?: JobRecommendationOptions,
  ): Promise<EligibilityRunResult> {
    return this.eligibilityMatcher.run(
      profile,
      targets,
      this.config.jobThreshold,
      this.config.jobReviewCap,
      this.config.jobFinalCap,
      {
        timeoutMs: options?.timeoutMs ?? this.config.timeoutMs,
        concurrency: this.config.concurrency,
        signal: options?.signal,
      },
    );
  }

  async recommendForCandidate(
    candidateId: string,
    options?: JobRecommendationOptions,
  ): Promise<CandidateRecommendations | null> {
    if (!this.sources.profiles) {
      throw new Error("Candidate profile source is not configured");
    }
    const profile = await this.sources.profiles.getCandidateProfile(candidateId);
    if (!profile) {
      return null;
    }

    const targets = this.sources.targets ? await this.sources.targets.listActiveTargets() : [];
    const content = await this.recommendContent(profile, { timeoutMs: options?.timeoutMs });
    const jobs = await this.recommendJobs(profile, targets, options);
    return {
      candidateId,
      content,
      jobs,
    };
  }

  // Gateways may return hits without document metadata; fill those in through the lookup.
  private async hydrateDocuments(matches: Match[]): Promise<Match[]> {
    const bare = matches.filter((match) => !match.document.url).map((match) => match.document.id);
    if (!bare.length || !this.sources.documents) {
      return matches;
    }
    try {
      const documents = await this.sources.documents.findByReferences(bare);
      const byId = new Map(documents.map((document) => [document.id, document]));
      return matches.map((match) => {
        const document = match.document.url ? undefined : byId.get(match.document.id);
        return document ? { ...match, document } : match;
      });
    } catch (error) {
      this.logger.warn("Document metadata lookup failed", {
        documentIds: bare,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      return matches;
    }
  }
}
