import { createApp } from "./app";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { engine, logger, candidatesRepository } = createApp(env);

  const candidateIds = process.argv.slice(2).filter((item) => item.trim().length > 0);
  if (!candidateIds.length) {
    logger.error("Usage: main <candidate-id> [candidate-id...]");
    process.exitCode = 1;
    return;
  }
  if (!candidatesRepository.isEnabled()) {
    logger.error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required to load candidates");
    process.exitCode = 1;
    return;
  }

  for (const candidateId of candidateIds) {
    try {
      const result = await engine.recommendForCandidate(candidateId);
      if (!result) {
        logger.warn("Candidate not found", { candidateId });
        continue;
      }
      process.stdout.write(
        `${JSON.stringify(
          {
            candidateId,
            content: result.content.map((match) => ({
              title: match.document.title,
              url: match.document.url,
              score: Number(match.score.toFixed(4)),
              source: match.sourceField,
            })),
            jobs: result.jobs.confirmed.map((match) => ({
              id: match.target.id,
              title: match.target.title,
              similarity: Number(match.similarity.toFixed(4)),
              confidence: match.judgment.confidence,
            })),
          },
          null,
          2,
        )}\n`,
      );
    } catch (error) {
      logger.error("Recommendation failed", {
        candidateId,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      process.exitCode = 1;
    }
  }
}

void bootstrap();
