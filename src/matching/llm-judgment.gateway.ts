import { Logger } from "../config/logger";
import { StructuredJsonClient } from "../ai/llm.client";
import { callJsonPromptSafe, isRecord, SafeJsonErrorCode } from "../ai/llm.safe";
import { buildEligibilityReviewV1Prompt } from "../ai/prompts/matching/eligibility-review.v1.prompt";
import { buildRerankPrompt } from "../ai/prompts/rerank.prompt";
import { GatewayError, GatewayTimeoutError } from "../shared/errors";
import { JudgmentConfidence } from "../shared/types/matching.types";
import {
  AttributedJudgment,
  JudgeInput,
  JudgmentGateway,
  SelectIndicesInput,
} from "./judgment.gateway";

const RERANK_PROMPT_NAME = "content_rerank_v1";
const ELIGIBILITY_PROMPT_NAME = "eligibility_review_v1";
const EXCERPT_MAX_CHARS = 280;
const SUBJECT_MAX_CHARS = 2400;

interface IndicesShape {
  indices: unknown[];
}

interface JudgmentsShape {
  judgments: unknown[];
}

export class LlmJudgmentGateway implements JudgmentGateway {
  readonly name = "llm_judgment";

  constructor(
    private readonly llmClient: StructuredJsonClient,
    private readonly logger: Logger,
  ) {}

  async selectIndices(input: SelectIndicesInput): Promise<number[]> {
    const prompt = buildRerankPrompt(
      input.subjectSummary.slice(0, SUBJECT_MAX_CHARS),
      input.entries.map((entry) => ({
        index: entry.index,
        title: entry.title,
        author: entry.author ?? "",
        publishedDate: entry.publishedDate ?? "",
        score: entry.score,
        excerpt: entry.excerpt.slice(0, EXCERPT_MAX_CHARS),
      })),
      input.count,
    );

    const safe = await callJsonPromptSafe<IndicesShape>({
      llmClient: this.llmClient,
      prompt,
      maxTokens: 120,
      promptName: RERANK_PROMPT_NAME,
      schemaHint: "Selection JSON with indices: number[].",
      logger: this.logger,
      timeoutMs: input.timeoutMs,
      retryTransient: false,
      repairMalformed: false,
      validate: (value): value is Record<string, unknown> & IndicesShape => Array.isArray(value.indices),
    });
    if (!safe.ok) {
      throw this.toGatewayError(RERANK_PROMPT_NAME, safe.error_code, input.timeoutMs);
    }

    return safe.data.indices
      .map((item) => parseIndex(item))
      .filter((item): item is number => item !== null);
  }

  async judge(input: JudgeInput): Promise<AttributedJudgment[]> {
    const prompt = buildEligibilityReviewV1Prompt({
      subjectSummary: input.subjectSummary.slice(0, SUBJECT_MAX_CHARS),
      rubric: input.rubric,
      candidates: input.candidates.map((candidate) => ({
        id: candidate.id,
        title: candidate.title,
        company: candidate.company ?? "",
        seniority: candidate.seniority ?? "unknown",
        required: candidate.requiredCompetencies,
        optional: candidate.optionalCompetencies,
        description: candidate.description.slice(0, 1500),
      })),
    });

    const safe = await callJsonPromptSafe<JudgmentsShape>({
      llmClient: this.llmClient,
      prompt,
      maxTokens: 220 * Math.max(1, input.candidates.length),
      promptName: ELIGIBILITY_PROMPT_NAME,
      schemaHint: "Eligibility JSON with judgments[] containing id, accept, confidence, score, reasoning.",
      logger: this.logger,
      timeoutMs: input.timeoutMs,
      retryTransient: false,
      repairMalformed: false,
      validate: (value): value is Record<string, unknown> & JudgmentsShape => Array.isArray(value.judgments),
    });
    if (!safe.ok) {
      throw this.toGatewayError(ELIGIBILITY_PROMPT_NAME, safe.error_code, input.timeoutMs);
    }

    const allowedIds = new Set(input.candidates.map((candidate) => candidate.id));
    const judgments = safe.data.judgments
      .map((item) => parseJudgment(item))
      .filter((item): item is AttributedJudgment => item !== null && allowedIds.has(item.candidateId));
    if (!judgments.length) {
      throw new GatewayError(this.name, `${ELIGIBILITY_PROMPT_NAME} returned no usable judgments`);
    }
    return judgments;
  }

  private toGatewayError(promptName: string, errorCode: SafeJsonErrorCode, timeoutMs: number): Error {
    if (errorCode === "timeout") {
      return new GatewayTimeoutError(this.name, timeoutMs);
    }
    return new GatewayError(this.name, `${promptName}_failed:${errorCode}`);
  }
}

export function parseJudgment(value: unknown): AttributedJudgment | null {
  if (!isRecord(value)) {
    return null;
  }
  const candidateId = typeof value.id === "string" ? value.id.trim() : typeof value.id === "number" ? String(value.id) : "";
  if (!candidateId || typeof value.accept !== "boolean") {
    return null;
  }
  const score = Number(value.score);
  return {
    candidateId,
    accept: value.accept,
    confidence: parseConfidence(value.confidence),
    score: Number.isFinite(score) ? Math.round(Math.min(100, Math.max(0, score))) : 0,
    reasoning: typeof value.reasoning === "string" ? value.reasoning.trim().slice(0, 400) : "",
  };
}

// Integers or integer strings only; booleans, nulls and fractions are not indices.
function parseIndex(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
}

function parseConfidence(value: unknown): JudgmentConfidence {
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : "";
  if (normalized === "medium" || normalized === "high") {
    return normalized;
  }
  return "low";
}
