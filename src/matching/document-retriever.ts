import { Logger } from "../config/logger";
import {
  GatewayTimeoutError,
  InvalidParameterError,
  isPreconditionError,
  MissingEmbeddingError,
} from "../shared/errors";
import { CandidateProfile, DocumentRef, Match, PassageHit, ProfileField, ProfileVector } from "../shared/types/matching.types";
import { TimeoutError, withTimeout } from "../shared/utils/timeout";
import { SimilarityGateway } from "./similarity.gateway";

export interface DocumentRetrieverOptions {
  passageFanout?: number;
  timeoutMs?: number;
}

const DEFAULT_PASSAGE_FANOUT = 5;
const DEFAULT_TIMEOUT_MS = 25_000;

export class DocumentRetriever {
  private readonly passageFanout: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly gateway: SimilarityGateway,
    private readonly logger: Logger,
    options: DocumentRetrieverOptions = {},
  ) {
    this.passageFanout = Math.max(1, Math.floor(options.passageFanout ?? DEFAULT_PASSAGE_FANOUT));
    this.timeoutMs = Math.max(1, Math.floor(options.timeoutMs ?? DEFAULT_TIMEOUT_MS));
  }

  async retrieve(
    queryVector: ReadonlyArray<number>,
    threshold: number,
    cap: number,
    sourceField: ProfileField = "professional",
  ): Promise<Match[]> {
    assertRetrievalParams(threshold, cap);
    if (!queryVector.length) {
      throw new MissingEmbeddingError("", "Query vector is empty.");
    }
    const matches = await this.searchDeduplicated(queryVector, sourceField, threshold, cap);
    return matches.slice(0, cap);
  }

  async retrieveForProfile(profile: CandidateProfile, threshold: number, cap: number): Promise<Match[]> {
    assertRetrievalParams(threshold, cap);
    const primary = selectPrimaryVector(profile, this.logger);
    return this.retrieve(primary.values, threshold, cap, primary.field);
  }

  // Queries every field vector and keeps, per document, the best passage across fields.
  async retrieveMultiField(profile: CandidateProfile, threshold: number, cap: number): Promise<Match[]> {
    assertRetrievalParams(threshold, cap);
    const primary = selectPrimaryVector(profile, this.logger);
    const secondary = profile.vectors.filter(
      (vector) => vector.field !== primary.field && vector.field !== "legacy" && vector.values.length > 0,
    );

    const best = new Map<string, Match>();
    for (const vector of [primary, ...secondary]) {
      const matches = await this.searchDeduplicated(vector.values, vector.field, threshold, cap);
      for (const match of matches) {
        const current = best.get(match.document.id);
        if (!current || match.score > current.score) {
          best.set(match.document.id, match);
        }
      }
    }

    this.logger.debug("Multi-field retrieval merged", {
      candidateId: profile.candidateId,
      fields: [primary, ...secondary].map((vector) => vector.field),
      documents: best.size,
    });
    return sortByScore(Array.from(best.values())).slice(0, cap);
  }

  private async searchDeduplicated(
    vector: ReadonlyArray<number>,
    field: ProfileField,
    threshold: number,
    cap: number,
  ): Promise<Match[]> {
    let hits: PassageHit[];
    try {
      hits = await withTimeout(
        this.gateway.search({ vector: [...vector], threshold, limit: cap * this.passageFanout }),
        this.timeoutMs,
      );
    } catch (error) {
      if (isPreconditionError(error)) {
        throw error;
      }
      const failure = error instanceof TimeoutError ? new GatewayTimeoutError(this.gateway.name, this.timeoutMs) : error;
      this.logger.warn("Similarity search failed, returning no matches", {
        gateway: this.gateway.name,
        field,
        error: failure instanceof Error ? failure.message : "Unknown error",
      });
      return [];
    }

    return deduplicateHits(hits, threshold, field);
  }
}

export function deduplicateHits(hits: ReadonlyArray<PassageHit>, threshold: number, field: ProfileField): Match[] {
  const best = new Map<string, Match>();
  for (const hit of hits) {
    if (!hit.targetId || !(hit.score > threshold)) {
      continue;
    }
    const current = best.get(hit.targetId);
    if (!current || hit.score > current.score) {
      best.set(hit.targetId, {
        document: hit.document ?? current?.document ?? bareDocument(hit.targetId),
        score: hit.score,
        snippet: hit.snippet ?? "",
        sourceField: field,
      });
    } else if (hit.document && current.document.url === "") {
      current.document = hit.document;
    }
  }
  return sortByScore(Array.from(best.values()));
}

// Hits without metadata still count; the id stands in for the title until a lookup fills it.
function bareDocument(id: string): DocumentRef {
  return { id, title: id, url: "" };
}

export function selectPrimaryVector(profile: CandidateProfile, logger?: Logger): ProfileVector {
  const professional = findVector(profile.vectors, "professional");
  if (professional) {
    return professional;
  }
  const legacy = findVector(profile.vectors, "legacy");
  if (legacy) {
    logger?.warn("Using legacy embedding as primary vector", { candidateId: profile.candidateId });
    return legacy;
  }
  throw new MissingEmbeddingError(profile.candidateId);
}

function findVector(vectors: ReadonlyArray<ProfileVector>, field: ProfileField): ProfileVector | undefined {
  return vectors.find((vector) => vector.field === field && vector.values.length > 0);
}

function sortByScore(matches: Match[]): Match[] {
  return matches.sort((a, b) => b.score - a.score);
}

function assertRetrievalParams(threshold: number, cap: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidParameterError("threshold", threshold);
  }
  if (!Number.isInteger(cap) || cap < 1) {
    throw new InvalidParameterError("cap", cap);
  }
}
