import fetch from "node-fetch";
import { HttpFetch } from "../shared/types/http.types";

const OPENAI_EMBEDDINGS_URL = "https://api.openai.com/v1/embeddings";
const MAX_INPUT_CHARS = 6000;

interface EmbeddingsResponse {
  data?: Array<{
    embedding?: number[];
  }>;
}

export interface TargetEmbedder {
  embed(text: string): Promise<number[]>;
}

export class EmbeddingsClient implements TargetEmbedder {
  constructor(
    private readonly apiKey: string,
    private readonly model: string,
    private readonly fetchImpl: HttpFetch = fetch,
  ) {}

  async embed(text: string): Promise<number[]> {
    const response = await this.fetchImpl(OPENAI_EMBEDDINGS_URL, {
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiKey}`,
        "content-type": "application/json",
      },
      body: JSON.stringify({
        model: this.model,
        input: text.slice(0, MAX_INPUT_CHARS),
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Embeddings API error: HTTP ${response.status} - ${body}`);
    }

    const body = (await response.json()) as EmbeddingsResponse;
    const vector = body.data?.[0]?.embedding;
    if (!Array.isArray(vector) || vector.length === 0) {
      throw new Error("Embeddings API returned empty vector.");
    }

    return vector;
  }
}
