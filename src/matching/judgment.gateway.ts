import { Judgment } from "../shared/types/matching.types";

export interface SelectionEntry {
  index: number;
  title: string;
  author?: string;
  publishedDate?: string;
  score: number;
  excerpt: string;
}

export interface SelectIndicesInput {
  subjectSummary: string;
  entries: SelectionEntry[];
  count: number;
  timeoutMs: number;
}

export interface JudgmentCandidate {
  id: string;
  title: string;
  company?: string;
  seniority?: string;
  requiredCompetencies: string[];
  optionalCompetencies: string[];
  description: string;
}

export interface JudgeInput {
  subjectSummary: string;
  candidates: JudgmentCandidate[];
  rubric: string;
  timeoutMs: number;
}

export interface AttributedJudgment extends Judgment {
  candidateId: string;
}

/**
 * LLM-backed qualitative judgment. Implementations throw `GatewayError` or
 * `GatewayTimeoutError` on any failure, including output that does not parse.
 */
export interface JudgmentGateway {
  readonly name: string;
  selectIndices(input: SelectIndicesInput): Promise<number[]>;
  judge(input: JudgeInput): Promise<AttributedJudgment[]>;
}
