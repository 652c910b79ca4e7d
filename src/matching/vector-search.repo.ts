import { DimensionMismatchError } from "../shared/errors";
import { DocumentRef, PassageHit } from "../shared/types/matching.types";
import { SimilarityGateway, SimilaritySearchInput } from "./similarity.gateway";

export interface PassageVector {
  passageId: string;
  document: DocumentRef;
  vector: number[];
  text: string;
}

export interface VectorSearchResult {
  passageId: string;
  documentId: string;
  similarity: number;
  text: string;
}

export class VectorSearchRepository implements SimilarityGateway {
  readonly name = "in_memory_vector_search";

  constructor(private readonly passages: ReadonlyArray<PassageVector>) {}

  searchTopK(queryVector: number[], topK: number, threshold = -1): VectorSearchResult[] {
    const scored = this.passages
      .map((item) => ({
        passageId: item.passageId,
        documentId: item.document.id,
        similarity: cosineSimilarity(queryVector, item.vector),
        text: item.text,
      }))
      .filter((item) => Number.isFinite(item.similarity) && item.similarity > threshold)
      .sort((a, b) => b.similarity - a.similarity || a.passageId.localeCompare(b.passageId));

    return scored.slice(0, Math.max(0, topK));
  }

  async search(input: SimilaritySearchInput): Promise<PassageHit[]> {
    const documents = new Map(this.passages.map((item) => [item.document.id, item.document]));
    return this.searchTopK(input.vector, input.limit, input.threshold).map((item) => ({
      targetId: item.documentId,
      score: item.similarity,
      snippet: item.text,
      document: documents.get(item.documentId),
    }));
  }
}

export function cosineSimilarity(a: ReadonlyArray<number>, b: ReadonlyArray<number>): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  if (a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let index = 0; index < a.length; index += 1) {
    dot += a[index] * b[index];
    normA += a[index] * a[index];
    normB += b[index] * b[index];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
