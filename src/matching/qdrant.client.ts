import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { GatewayError } from "../shared/errors";
import { HttpFetch } from "../shared/types/http.types";
import { DocumentRef, PassageHit } from "../shared/types/matching.types";
import { SimilarityGateway, SimilaritySearchInput } from "./similarity.gateway";

const MAX_SEARCH_LIMIT = 500;

interface QdrantSearchPoint {
  id: number | string;
  payload?: Record<string, unknown>;
  score?: number;
}

interface QdrantSearchResponse {
  result?: QdrantSearchPoint[] | { points?: QdrantSearchPoint[] };
}

export interface QdrantClientConfig {
  baseUrl?: string;
  apiKey?: string;
  passageCollection: string;
}

export class QdrantClient implements SimilarityGateway {
  readonly name = "qdrant";
  private readonly baseUrl?: string;

  constructor(
    private readonly config: QdrantClientConfig,
    private readonly logger: Logger,
    private readonly fetchImpl: HttpFetch = fetch,
  ) {
    this.baseUrl = config.baseUrl?.replace(/\/+$/, "");
  }

  isEnabled(): boolean {
    return Boolean(this.baseUrl && this.config.apiKey && this.config.passageCollection.trim());
  }

  async search(input: SimilaritySearchInput): Promise<PassageHit[]> {
    if (!this.isEnabled()) {
      throw new GatewayError(this.name, "client is not configured");
    }
    if (!Array.isArray(input.vector) || input.vector.length === 0) {
      return [];
    }

    const collection = encodeURIComponent(this.config.passageCollection);
    const limit = Math.max(1, Math.min(input.limit, MAX_SEARCH_LIMIT));

    let response = await this.request<QdrantSearchResponse>("POST", `/collections/${collection}/points/search`, {
      vector: input.vector,
      limit,
      score_threshold: input.threshold,
      with_payload: true,
      with_vector: false,
    });
    if (!response.ok) {
      this.logger.debug("Qdrant points/search failed, retrying with points/query", {
        status: response.status,
      });
      response = await this.request<QdrantSearchResponse>("POST", `/collections/${collection}/points/query`, {
        query: input.vector,
        limit,
        score_threshold: input.threshold,
        with_payload: true,
        with_vector: false,
      });
    }

    if (!response.ok) {
      throw new GatewayError(this.name, `search failed: HTTP ${response.status} - ${response.body.slice(0, 300)}`);
    }

    const points = extractPoints(response.data);
    return points
      .map((point) => toPassageHit(point))
      .filter((hit): hit is PassageHit => hit !== null && hit.score > input.threshold)
      .sort((a, b) => b.score - a.score);
  }

  private async request<T>(
    method: "POST",
    path: string,
    body?: Record<string, unknown>,
  ): Promise<{ ok: true; data: T } | { ok: false; status: number; body: string }> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(),
      body: body ? JSON.stringify(body) : undefined,
    });

    if (!response.ok) {
      return {
        ok: false,
        status: response.status,
        body: await response.text(),
      };
    }

    return {
      ok: true,
      data: (await response.json()) as T,
    };
  }

  private headers(): Record<string, string> {
    return {
      "content-type": "application/json",
      "api-key": this.config.apiKey ?? "",
    };
  }
}

function extractPoints(data: QdrantSearchResponse): QdrantSearchPoint[] {
  const result = data.result;
  if (Array.isArray(result)) {
    return result;
  }
  if (result && Array.isArray(result.points)) {
    return result.points;
  }
  return [];
}

function toPassageHit(point: QdrantSearchPoint): PassageHit | null {
  const payload = point.payload ?? {};
  const documentId = toText(payload.document_id);
  const score = Number(point.score);
  if (!documentId || !Number.isFinite(score)) {
    return null;
  }
  return {
    targetId: documentId,
    score,
    snippet: toText(payload.chunk_text) || undefined,
    document: toDocumentRef(documentId, payload),
  };
}

function toDocumentRef(documentId: string, payload: Record<string, unknown>): DocumentRef | undefined {
  const url = toText(payload.url);
  if (!url) {
    return undefined;
  }
  return {
    id: documentId,
    title: toText(payload.title) || url,
    url,
    author: toText(payload.author) || undefined,
    publishedDate: toText(payload.published_date) || undefined,
    featuredImage: toText(payload.featured_image) || undefined,
  };
}

function toText(value: unknown): string {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return typeof value === "string" ? value.trim() : "";
}
