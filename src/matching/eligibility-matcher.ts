import { TargetEmbedder } from "../ai/embeddings.client";
import { ELIGIBILITY_RUBRIC_V1 } from "../ai/prompts/matching/eligibility-review.v1.prompt";
import { Logger, logContext } from "../config/logger";
import {
  DimensionMismatchError,
  GatewayTimeoutError,
  InvalidParameterError,
  MatchingError,
} from "../shared/errors";
import {
  CandidateProfile,
  ConfirmedMatch,
  EligibilityTarget,
  Judgment,
  TargetOutcome,
} from "../shared/types/matching.types";
import { mapWithConcurrency } from "../shared/utils/concurrency";
import { normalizeTimeout, TimeoutError, withTimeout } from "../shared/utils/timeout";
import { selectPrimaryVector } from "./document-retriever";
import { AttributedJudgment, JudgmentCandidate, JudgmentGateway } from "./judgment.gateway";
import { buildProfileSummary } from "./rerank.service";
import { cosineSimilarity } from "./vector-search.repo";

export interface EligibilityOptions {
  timeoutMs?: number;
  concurrency?: number;
  rubric?: string;
  signal?: AbortSignal;
}

export interface EligibilityMatcherDefaults {
  timeoutMs: number;
  concurrency: number;
}

export interface EligibilityRunResult {
  confirmed: ConfirmedMatch[];
  outcomes: TargetOutcome[];
  cancelled: boolean;
}

interface Survivor {
  position: number;
  target: EligibilityTarget;
  similarity: number;
}

const DEFAULTS: EligibilityMatcherDefaults = {
  timeoutMs: 25_000,
  concurrency: 4,
};

export class TwoStageEligibilityMatcher {
  private readonly defaults: EligibilityMatcherDefaults;

  constructor(
    private readonly judgmentGateway: JudgmentGateway,
    private readonly logger: Logger,
    private readonly embedder?: TargetEmbedder,
    defaults?: Partial<EligibilityMatcherDefaults>,
  ) {
    this.defaults = { ...DEFAULTS, ...(defaults ?? {}) };
  }

  async matchEligible(
    profile: CandidateProfile,
    targets: ReadonlyArray<EligibilityTarget>,
    simThreshold: number,
    llmReviewCap: number,
    finalCap: number,
    options?: EligibilityOptions,
  ): Promise<ConfirmedMatch[]> {
    const result = await this.run(profile, targets, simThreshold, llmReviewCap, finalCap, options);
    return result.confirmed;
  }

  async run(
    profile: CandidateProfile,
    targets: ReadonlyArray<EligibilityTarget>,
    simThreshold: number,
    llmReviewCap: number,
    finalCap: number,
    options?: EligibilityOptions,
  ): Promise<EligibilityRunResult> {
    assertEligibilityParams(simThreshold, llmReviewCap, finalCap);
    const primary = selectPrimaryVector(profile, this.logger);
    const timeoutMs = normalizeTimeout(options?.timeoutMs, this.defaults.timeoutMs);
    const concurrency = Math.max(1, Math.floor(options?.concurrency ?? this.defaults.concurrency));
    const context = { candidate_id: profile.candidateId, pipeline: "jobs" as const };

    const outcomes: TargetOutcome[] = targets.map((target): TargetOutcome => ({
      targetId: target.id,
      state: "excluded",
      similarity: null,
    }));

    const active: Array<{ position: number; target: EligibilityTarget }> = [];
    targets.forEach((target, position) => {
      if (target.status === "active") {
        active.push({ position, target });
      } else {
        outcomes[position].reason = `status_${target.status}`;
      }
    });

    const scored = await mapWithConcurrency(active, concurrency, async ({ target }) => {
      const vector = await this.resolveTargetVector(target, timeoutMs);
      return cosineSimilarity(primary.values, vector);
    });

    const survivors: Survivor[] = [];
    for (const result of scored) {
      const { position, target } = active[result.index];
      if (result.status !== "fulfilled" || typeof result.value !== "number") {
        if (result.error instanceof DimensionMismatchError) {
          throw result.error;
        }
        outcomes[position].reason = "embedding_failed";
        logContext(this.logger, "warn", "Target embedding unavailable, excluding target", {
          ...context,
          stage: "similarity",
          target_id: target.id,
        }, { error: result.error instanceof Error ? result.error.message : "Unknown error" });
        continue;
      }
      outcomes[position].similarity = result.value;
      if (result.value < simThreshold) {
        outcomes[position].reason = "below_threshold";
        continue;
      }
      survivors.push({ position, target, similarity: result.value });
    }
    survivors.sort((a, b) => b.similarity - a.similarity);

    const reviewed = survivors.slice(0, llmReviewCap);
    for (const skipped of survivors.slice(llmReviewCap)) {
      outcomes[skipped.position].state = "not_reviewed";
      outcomes[skipped.position].reason = "review_cap";
    }
    logContext(this.logger, "info", "Eligibility similarity stage completed", { ...context, stage: "similarity" }, {
      targets: targets.length,
      active: active.length,
      survivors: survivors.length,
      reviewing: reviewed.length,
    });

    const subjectSummary = buildProfileSummary(profile);
    const rubric = options?.rubric ?? ELIGIBILITY_RUBRIC_V1;
    const judged = await mapWithConcurrency(
      reviewed,
      concurrency,
      ({ target }) => this.judgeTarget(subjectSummary, rubric, target, timeoutMs),
      options?.signal,
    );

    const confirmed: ConfirmedMatch[] = [];
    let cancelled = false;
    for (const result of judged) {
      const survivor = reviewed[result.index];
      const outcome = outcomes[survivor.position];
      if (result.status === "skipped") {
        cancelled = true;
        outcome.state = "cancelled";
        outcome.reason = "cancelled";
        continue;
      }
      if (result.status === "rejected" || !result.value) {
        outcome.state = "rejected";
        outcome.reason = result.error instanceof MatchingError ? result.error.code : "gateway_error";
        logContext(this.logger, "warn", "Eligibility review failed, rejecting target", {
          ...context,
          stage: "review",
          target_id: survivor.target.id,
          ok: false,
          error_code: outcome.reason,
        }, { error: result.error instanceof Error ? result.error.message : "Unknown error" });
        continue;
      }
      outcome.judgment = result.value;
      if (result.value.accept === true) {
        outcome.state = "confirmed";
        confirmed.push({ target: survivor.target, similarity: survivor.similarity, judgment: result.value });
      } else {
        outcome.state = "rejected";
        outcome.reason = "declined";
      }
    }

    confirmed.sort((a, b) => b.similarity - a.similarity);
    logContext(this.logger, "info", "Eligibility review stage completed", { ...context, stage: "review" }, {
      reviewed: reviewed.length,
      confirmed: confirmed.length,
      cancelled,
    });
    return {
      confirmed: confirmed.slice(0, finalCap),
      outcomes,
      cancelled,
    };
  }

  private async resolveTargetVector(target: EligibilityTarget, timeoutMs: number): Promise<number[]> {
    if (target.embedding && target.embedding.length > 0) {
      return target.embedding;
    }
    if (!this.embedder) {
      throw new Error(`Target ${target.id} has no embedding and no embedder is configured`);
    }
    return withTimeout(this.embedder.embed(buildTargetEmbeddingText(target)), timeoutMs);
  }

  private async judgeTarget(
    subjectSummary: string,
    rubric: string,
    target: EligibilityTarget,
    timeoutMs: number,
  ): Promise<Judgment> {
    let judgments: AttributedJudgment[];
    try {
      judgments = await withTimeout(
        this.judgmentGateway.judge({
          subjectSummary,
          candidates: [toJudgmentCandidate(target)],
          rubric,
          timeoutMs,
        }),
        timeoutMs,
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new GatewayTimeoutError(this.judgmentGateway.name, timeoutMs);
      }
      throw error;
    }

    const judgment = judgments.find((item) => item.candidateId === target.id);
    if (!judgment) {
      throw new Error(`No judgment returned for target ${target.id}`);
    }
    return {
      accept: judgment.accept,
      confidence: judgment.confidence,
      score: judgment.score,
      reasoning: judgment.reasoning,
    };
  }
}

// Field order is fixed so the same target always embeds the same text.
export function buildTargetEmbeddingText(target: EligibilityTarget): string {
  const lines = [`Title: ${target.title}`];
  if (target.company) {
    lines.push(`Company: ${target.company}`);
  }
  if (target.seniority && target.seniority !== "unknown") {
    lines.push(`Seniority: ${target.seniority}`);
  }
  if (target.location) {
    lines.push(`Location: ${target.location}`);
  }
  if (target.requiredCompetencies.length) {
    lines.push(`Required: ${target.requiredCompetencies.join(", ")}`);
  }
  if (target.optionalCompetencies.length) {
    lines.push(`Nice to have: ${target.optionalCompetencies.join(", ")}`);
  }
  if (target.description.trim()) {
    lines.push(target.description.trim());
  }
  return lines.join("\n");
}

function toJudgmentCandidate(target: EligibilityTarget): JudgmentCandidate {
  return {
    id: target.id,
    title: target.title,
    company: target.company,
    seniority: target.seniority,
    requiredCompetencies: target.requiredCompetencies,
    optionalCompetencies: target.optionalCompetencies,
    description: target.description,
  };
}

function assertEligibilityParams(simThreshold: number, llmReviewCap: number, finalCap: number): void {
  if (!Number.isFinite(simThreshold) || simThreshold < 0 || simThreshold > 1) {
    throw new InvalidParameterError("simThreshold", simThreshold);
  }
  if (!Number.isInteger(llmReviewCap) || llmReviewCap < 1) {
    throw new InvalidParameterError("llmReviewCap", llmReviewCap);
  }
  if (!Number.isInteger(finalCap) || finalCap < 1) {
    throw new InvalidParameterError("finalCap", finalCap);
  }
}
