export type ProfileField = "professional" | "preferences" | "interests" | "legacy";

export interface ProfileVector {
  field: ProfileField;
  values: number[];
}

export interface CandidateProfile {
  candidateId: string;
  fullName?: string;
  currentTitle?: string;
  summary: string;
  vectors: ProfileVector[];
  // Document ids or URLs an operator pinned for this candidate.
  pinnedDocuments?: string[];
}

export interface DocumentRef {
  id: string;
  title: string;
  url: string;
  author?: string;
  publishedDate?: string;
  featuredImage?: string;
}

export interface PassageHit {
  targetId: string;
  score: number;
  snippet?: string;
  document?: DocumentRef;
}

// "pinned" marks documents an operator attached to the profile rather than retrieved ones.
export type MatchSource = ProfileField | "pinned";

export interface Match {
  document: DocumentRef;
  score: number;
  snippet: string;
  sourceField: MatchSource;
}

export type TargetStatus = "active" | "inactive" | "filled" | "closed";

export type SeniorityLevel = "junior" | "mid" | "senior" | "staff" | "principal" | "lead" | "unknown";

export interface EligibilityTarget {
  id: string;
  title: string;
  company?: string;
  status: TargetStatus;
  seniority?: SeniorityLevel;
  requiredCompetencies: string[];
  optionalCompetencies: string[];
  description: string;
  location?: string;
  embedding?: number[];
}

export type JudgmentConfidence = "low" | "medium" | "high";

export interface Judgment {
  accept: boolean;
  confidence: JudgmentConfidence;
  score: number;
  reasoning: string;
}

export interface ConfirmedMatch {
  target: EligibilityTarget;
  similarity: number;
  judgment: Judgment;
}

export type TargetState =
  | "excluded"
  | "not_reviewed"
  | "confirmed"
  | "rejected"
  | "cancelled";

export interface TargetOutcome {
  targetId: string;
  state: TargetState;
  similarity: number | null;
  judgment?: Judgment;
  reason?: string;
}
