import { PassageHit } from "../shared/types/matching.types";

export interface SimilaritySearchInput {
  vector: number[];
  threshold: number;
  limit: number;
}

// Implementations return hits sorted by descending score.
export interface SimilarityGateway {
  readonly name: string;
  search(input: SimilaritySearchInput): Promise<PassageHit[]>;
}
