import { Logger } from "../config/logger";
import { GatewayError } from "../shared/errors";
import { PassageHit } from "../shared/types/matching.types";
import { SimilarityGateway, SimilaritySearchInput } from "./similarity.gateway";

// Tries each gateway in order and returns the first successful answer.
export class FallbackSimilarityGateway implements SimilarityGateway {
  readonly name: string;

  constructor(
    private readonly gateways: ReadonlyArray<SimilarityGateway>,
    private readonly logger: Logger,
  ) {
    this.name = gateways.length ? gateways.map((gateway) => gateway.name).join(">") : "none";
  }

  async search(input: SimilaritySearchInput): Promise<PassageHit[]> {
    let lastError: unknown = null;
    for (const gateway of this.gateways) {
      try {
        return await gateway.search(input);
      } catch (error) {
        lastError = error;
        this.logger.warn("Similarity search failed, trying next gateway", {
          gateway: gateway.name,
          error: error instanceof Error ? error.message : "Unknown error",
        });
      }
    }

    if (lastError instanceof GatewayError) {
      throw lastError;
    }
    throw new GatewayError(
      this.name,
      lastError instanceof Error ? lastError.message : "no similarity gateway configured",
    );
  }
}
