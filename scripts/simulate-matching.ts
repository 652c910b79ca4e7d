import { createLogger } from "../src/config/logger";
import { DocumentRetriever } from "../src/matching/document-retriever";
import { TwoStageEligibilityMatcher } from "../src/matching/eligibility-matcher";
import {
  AttributedJudgment,
  JudgeInput,
  JudgmentGateway,
  SelectIndicesInput,
} from "../src/matching/judgment.gateway";
import { MatchingEngine } from "../src/matching/matching.engine";
import { HybridReranker } from "../src/matching/rerank.service";
import { PassageVector, VectorSearchRepository } from "../src/matching/vector-search.repo";
import { CandidateProfile, EligibilityTarget } from "../src/shared/types/matching.types";

// Picks the highest indices first, so the output visibly differs from similarity order.
class KeywordJudgmentGateway implements JudgmentGateway {
  readonly name = "keyword_judge";

  async selectIndices(input: SelectIndicesInput): Promise<number[]> {
    return input.entries
      .map((entry) => entry.index)
      .reverse()
      .slice(0, input.count);
  }

  async judge(input: JudgeInput): Promise<AttributedJudgment[]> {
    const subject = input.subjectSummary.toLowerCase();
    return input.candidates.map((candidate): AttributedJudgment => {
      const missing = candidate.requiredCompetencies.filter((item) => !subject.includes(item.toLowerCase()));
      return {
        candidateId: candidate.id,
        accept: missing.length === 0,
        confidence: missing.length === 0 ? "high" : "medium",
        score: Math.max(0, 100 - missing.length * 30),
        reasoning: missing.length ? `Missing: ${missing.join(", ")}` : "All required competencies present.",
      };
    });
  }
}

async function run(): Promise<void> {
  const logger = createLogger({ minLevel: "info" });
  const gateway = new VectorSearchRepository(buildPassages());
  const judge = new KeywordJudgmentGateway();
  const engine = new MatchingEngine(
    new DocumentRetriever(gateway, logger),
    new HybridReranker(judge, logger),
    new TwoStageEligibilityMatcher(judge, logger),
    logger,
    {
      contentThreshold: 0.25,
      contentPoolSize: 30,
      contentFinalCount: 3,
      contentRerankEnabled: true,
      contentMultiField: true,
      excludedMarkers: ["career", "team", "culture", "life at", "meet the engineers"],
      jobThreshold: 0.35,
      jobReviewCap: 5,
      jobFinalCap: 3,
      timeoutMs: 5_000,
      concurrency: 2,
    },
  );

  const profile: CandidateProfile = {
    candidateId: "sim-candidate-1",
    fullName: "Sample Candidate",
    currentTitle: "Backend Engineer",
    summary: "Backend engineer working with TypeScript, PostgreSQL and Kafka on payment systems.",
    vectors: [
      { field: "professional", values: [1, 0.2, 0, 0] },
      { field: "interests", values: [0, 0, 1, 0.1] },
    ],
    pinnedDocuments: ["https://blog.example.com/welcome"],
  };

  const content = await engine.recommendContent(profile);
  assert(content.length === 3, `expected 3 content items, got ${content.length}`);
  assert(content[0].sourceField === "pinned", "pinned document should lead the selection");

  const jobs = await engine.recommendJobs(profile, buildTargets());
  assert(jobs.confirmed.length === 1, `expected 1 confirmed job, got ${jobs.confirmed.length}`);
  assert(jobs.confirmed[0].target.id === "job-backend", "backend role should be confirmed");

  process.stdout.write(
    `${JSON.stringify(
      {
        content: content.map((match) => ({ id: match.document.id, score: match.score, source: match.sourceField })),
        jobs: jobs.outcomes,
      },
      null,
      2,
    )}\n`,
  );
}

function buildPassages(): PassageVector[] {
  const doc = (id: string, title: string) => ({ id, title, url: `https://blog.example.com/${id}` });
  return [
    { passageId: "p1", document: doc("welcome", "Welcome to the blog"), vector: [0.3, 0, 0, 1], text: "Hello." },
    { passageId: "p2", document: doc("kafka", "Scaling Kafka consumers"), vector: [0.9, 0.3, 0, 0], text: "Partitions." },
    { passageId: "p3", document: doc("kafka", "Scaling Kafka consumers"), vector: [0.8, 0.1, 0.1, 0], text: "Lag." },
    { passageId: "p4", document: doc("postgres", "Postgres indexing notes"), vector: [0.7, 0.5, 0, 0], text: "B-trees." },
    { passageId: "p5", document: doc("culture", "Life at the company"), vector: [0.6, 0.1, 0, 0], text: "Offsites." },
    { passageId: "p6", document: doc("ml", "Embedding search in practice"), vector: [0, 0.1, 0.9, 0], text: "Vectors." },
  ];
}

function buildTargets(): EligibilityTarget[] {
  const base = { status: "active" as const, optionalCompetencies: [], description: "" };
  return [
    { ...base, id: "job-backend", title: "Backend Engineer", requiredCompetencies: ["TypeScript", "PostgreSQL"], embedding: [1, 0.1, 0, 0] },
    { ...base, id: "job-ios", title: "iOS Engineer", requiredCompetencies: ["Swift"], embedding: [0.9, 0, 0, 0.2] },
    { ...base, id: "job-design", title: "Product Designer", requiredCompetencies: ["Figma"], embedding: [0, 0, 0, 1] },
    { ...base, id: "job-closed", title: "Data Engineer", status: "closed", requiredCompetencies: [], embedding: [1, 0, 0, 0] },
  ];
}

function assert(condition: unknown, message: string): void {
  if (!condition) {
    throw new Error(`simulate-matching failed, ${message}`);
  }
}

run().catch((error) => {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
