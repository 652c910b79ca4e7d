import { SupabaseRestClient } from "../db/supabase.client";
import { GatewayError } from "../shared/errors";
import { PassageHit } from "../shared/types/matching.types";
import { SimilarityGateway, SimilaritySearchInput } from "./similarity.gateway";

const SEARCH_RPC = "search_blogs_for_candidate";

interface BlogChunkMatchRow {
  blog_post_id: number | string;
  blog_title?: string | null;
  blog_url?: string | null;
  blog_author?: string | null;
  blog_published_date?: string | null;
  blog_featured_image?: string | null;
  chunk_text?: string | null;
  similarity: number | string;
}

export class SupabaseSimilarityGateway implements SimilarityGateway {
  readonly name = "supabase_rpc";

  constructor(private readonly supabaseClient: SupabaseRestClient) {}

  async search(input: SimilaritySearchInput): Promise<PassageHit[]> {
    if (!input.vector.length) {
      return [];
    }

    let rows: BlogChunkMatchRow[];
    try {
      rows = await this.supabaseClient.rpc<BlogChunkMatchRow>(SEARCH_RPC, {
        candidate_embedding: input.vector,
        match_threshold: input.threshold,
        match_count: input.limit,
      });
    } catch (error) {
      throw new GatewayError(this.name, error instanceof Error ? error.message : "Unknown error");
    }

    return rows
      .map((row) => toPassageHit(row))
      .filter((hit): hit is PassageHit => hit !== null && hit.score > input.threshold)
      .sort((a, b) => b.score - a.score);
  }
}

function toPassageHit(row: BlogChunkMatchRow): PassageHit | null {
  const id = String(row.blog_post_id ?? "").trim();
  const score = Number(row.similarity);
  if (!id || !Number.isFinite(score)) {
    return null;
  }
  const url = row.blog_url?.trim() ?? "";
  return {
    targetId: id,
    score,
    snippet: row.chunk_text?.trim() || undefined,
    document: url
      ? {
          id,
          title: row.blog_title?.trim() || url,
          url,
          author: row.blog_author?.trim() || undefined,
          publishedDate: row.blog_published_date?.trim() || undefined,
          featuredImage: row.blog_featured_image?.trim() || undefined,
        }
      : undefined,
  };
}
