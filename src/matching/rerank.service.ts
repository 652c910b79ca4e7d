import { Logger } from "../config/logger";
import { GatewayTimeoutError, InvalidParameterError } from "../shared/errors";
import { CandidateProfile, Match } from "../shared/types/matching.types";
import { normalizeTimeout, TimeoutError, withTimeout } from "../shared/utils/timeout";
import { JudgmentGateway, SelectionEntry } from "./judgment.gateway";

const DEFAULT_RERANK_TIMEOUT_MS = 25_000;
const PROFILE_SUMMARY_MAX_CHARS = 1200;

export interface RerankOptions {
  timeoutMs?: number;
}

export class HybridReranker {
  constructor(
    private readonly judgmentGateway: JudgmentGateway,
    private readonly logger: Logger,
    private readonly defaultTimeoutMs = DEFAULT_RERANK_TIMEOUT_MS,
  ) {}

  async rerank(
    profile: CandidateProfile,
    pool: ReadonlyArray<Match>,
    finalCount: number,
    options?: RerankOptions,
  ): Promise<Match[]> {
    if (!Number.isInteger(finalCount) || finalCount < 1) {
      throw new InvalidParameterError("finalCount", finalCount);
    }
    if (pool.length <= finalCount) {
      return [...pool];
    }

    const timeoutMs = normalizeTimeout(options?.timeoutMs, this.defaultTimeoutMs);
    const fallback = pool.slice(0, finalCount);
    const startedAt = Date.now();

    let indices: number[];
    try {
      indices = await withTimeout(
        this.judgmentGateway.selectIndices({
          subjectSummary: buildProfileSummary(profile),
          entries: toSelectionEntries(pool),
          count: finalCount,
          timeoutMs,
        }),
        timeoutMs,
      );
    } catch (error) {
      const failure = error instanceof TimeoutError ? new GatewayTimeoutError(this.judgmentGateway.name, timeoutMs) : error;
      this.logger.warn("Rerank failed, using similarity order", {
        candidateId: profile.candidateId,
        latencyMs: Date.now() - startedAt,
        error: failure instanceof Error ? failure.message : "Unknown error",
      });
      return fallback;
    }

    const selected = pickValidIndices(indices, pool.length)
      .slice(0, finalCount)
      .map((index) => pool[index - 1]);
    if (!selected.length) {
      this.logger.warn("Rerank returned no usable indices, using similarity order", {
        candidateId: profile.candidateId,
        returned: indices.length,
      });
      return fallback;
    }

    this.logger.info("Rerank completed", {
      candidateId: profile.candidateId,
      poolSize: pool.length,
      selected: selected.length,
      latencyMs: Date.now() - startedAt,
    });
    return selected;
  }
}

// 1-based indices, first occurrence only, returned order kept.
export function pickValidIndices(indices: ReadonlyArray<number>, poolSize: number): number[] {
  const seen = new Set<number>();
  const output: number[] = [];
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 1 || index > poolSize || seen.has(index)) {
      continue;
    }
    seen.add(index);
    output.push(index);
  }
  return output;
}

export function buildProfileSummary(profile: CandidateProfile): string {
  const header = [profile.fullName, profile.currentTitle].filter((item): item is string => Boolean(item)).join(", ");
  const body = profile.summary.trim().slice(0, PROFILE_SUMMARY_MAX_CHARS);
  return header ? `${header}\n${body}` : body;
}

function toSelectionEntries(pool: ReadonlyArray<Match>): SelectionEntry[] {
  return pool.map((match, position) => ({
    index: position + 1,
    title: match.document.title,
    author: match.document.author,
    publishedDate: match.document.publishedDate,
    score: Number(match.score.toFixed(4)),
    excerpt: match.snippet.slice(0, 280),
  }));
}
