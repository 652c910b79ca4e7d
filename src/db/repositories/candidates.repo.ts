import { Logger } from "../../config/logger";
import { CandidateProfile, ProfileVector } from "../../shared/types/matching.types";
import { parseEmbedding } from "../embedding.parser";
import { SupabaseRestClient } from "../supabase.client";

const CANDIDATE_PROFILES_TABLE = "candidate_profiles";
const PROFILE_RPC = "get_candidate_profile_with_embedding";

export interface CandidateProfileRow {
  candidate_id: string;
  full_name?: string | null;
  current_title?: string | null;
  current_company?: string | null;
  embedding_text?: string | null;
  embedding?: unknown;
  professional_summary?: string | null;
  professional_summary_embedding?: unknown;
  job_preferences?: string | null;
  job_preferences_embedding?: unknown;
  interests?: string | null;
  interests_embedding?: unknown;
}

interface PinnedRow {
  pinned_blogs?: unknown;
}

export class CandidatesRepository {
  constructor(
    private readonly logger: Logger,
    private readonly supabaseClient?: SupabaseRestClient,
  ) {}

  isEnabled(): boolean {
    return Boolean(this.supabaseClient);
  }

  async getCandidateProfile(candidateId: string): Promise<CandidateProfile | null> {
    if (!this.supabaseClient) {
      return null;
    }

    const rows = await this.supabaseClient.rpc<CandidateProfileRow>(PROFILE_RPC, {
      candidate_external_id: candidateId,
    });
    const row = rows[0];
    if (!row) {
      this.logger.warn("Candidate profile not found", { candidateId });
      return null;
    }

    const pinned = await this.supabaseClient.selectOne<PinnedRow>(
      CANDIDATE_PROFILES_TABLE,
      { candidate_id: candidateId },
      "pinned_blogs",
    );

    return mapCandidateRow(row, parsePinned(pinned?.pinned_blogs));
  }
}

export function mapCandidateRow(row: CandidateProfileRow, pinnedDocuments: string[]): CandidateProfile {
  const vectors: ProfileVector[] = [];
  const professional = parseEmbedding(row.professional_summary_embedding);
  const preferences = parseEmbedding(row.job_preferences_embedding);
  const interests = parseEmbedding(row.interests_embedding);
  const legacy = parseEmbedding(row.embedding);
  if (professional) {
    vectors.push({ field: "professional", values: professional });
  }
  if (preferences) {
    vectors.push({ field: "preferences", values: preferences });
  }
  if (interests) {
    vectors.push({ field: "interests", values: interests });
  }
  if (legacy) {
    vectors.push({ field: "legacy", values: legacy });
  }

  const summary = [row.professional_summary, row.job_preferences, row.interests]
    .map((item) => item?.trim() ?? "")
    .filter((item) => item.length > 0)
    .join("\n\n");

  return {
    candidateId: row.candidate_id,
    fullName: row.full_name?.trim() || undefined,
    currentTitle: row.current_title?.trim() || undefined,
    summary: summary || row.embedding_text?.trim() || "",
    vectors,
    pinnedDocuments,
  };
}

// Pinned entries are stored either as plain strings or as { url, title } objects.
export function parsePinned(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const references = value
    .map((item) => {
      if (typeof item === "string") {
        return item.trim();
      }
      if (typeof item === "object" && item !== null && "url" in item && typeof item.url === "string") {
        return item.url.trim();
      }
      return "";
    })
    .filter((item) => item.length > 0);
  return Array.from(new Set(references));
}
