import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { TargetEmbedder } from "../../ai/embeddings.client";
import { buildTargetEmbeddingText, TwoStageEligibilityMatcher } from "../../matching/eligibility-matcher";
import {
  AttributedJudgment,
  JudgeInput,
  JudgmentGateway,
  SelectIndicesInput,
} from "../../matching/judgment.gateway";
import {
  DimensionMismatchError,
  GatewayError,
  InvalidParameterError,
  MissingEmbeddingError,
} from "../../shared/errors";
import { CandidateProfile, EligibilityTarget } from "../../shared/types/matching.types";
import { recordingLogger } from "../helpers/fakes";

type Decision = boolean | Error | "hang";

class ScriptedJudge implements JudgmentGateway {
  readonly name = "scripted_judge";
  readonly judged: string[] = [];
  inFlight = 0;
  peak = 0;

  constructor(
    private readonly decide: (targetId: string) => Decision,
    private readonly onJudge?: (targetId: string) => void,
  ) {}

  async selectIndices(_input: SelectIndicesInput): Promise<number[]> {
    return [];
  }

  async judge(input: JudgeInput): Promise<AttributedJudgment[]> {
    const candidate = input.candidates[0];
    this.judged.push(candidate.id);
    this.onJudge?.(candidate.id);
    this.inFlight += 1;
    this.peak = Math.max(this.peak, this.inFlight);
    await new Promise<void>((resolve) => setTimeout(resolve, 2));
    this.inFlight -= 1;

    const decision = this.decide(candidate.id);
    if (decision instanceof Error) {
      throw decision;
    }
    if (decision === "hang") {
      return new Promise<AttributedJudgment[]>(() => undefined);
    }
    return [
      {
        candidateId: candidate.id,
        accept: decision,
        confidence: decision ? "high" : "low",
        score: decision ? 82 : 20,
        reasoning: decision ? "Strong overlap." : "Missing core skills.",
      },
    ];
  }
}

const profile: CandidateProfile = {
  candidateId: "cand-42",
  fullName: "Test Person",
  summary: "Backend engineer, TypeScript and Postgres.",
  vectors: [{ field: "professional", values: [1, 0] }],
};

function target(id: string, embedding: number[] | undefined, overrides: Partial<EligibilityTarget> = {}): EligibilityTarget {
  return {
    id,
    title: `Role ${id}`,
    status: "active",
    requiredCompetencies: ["TypeScript"],
    optionalCompetencies: [],
    description: "Build services.",
    embedding,
    ...overrides,
  };
}

// Similarity against [1, 0]: t1 0.6, t3 0.8, t5 1, t7 ~0.707 pass 0.35; the rest do not.
const tenTargets = [
  target("t1", [3, 4]),
  target("t2", [0, 1]),
  target("t3", [4, 3]),
  target("t4", [1, 3]),
  target("t5", [1, 0]),
  target("t6", [-1, 0]),
  target("t7", [1, 1]),
  target("t8", [1, 4]),
  target("t9", [0, -1]),
  target("t10", [1, 5]),
];

describe("TwoStageEligibilityMatcher", () => {
  it("confirms only accepted survivors, ordered by similarity", async () => {
    const judge = new ScriptedJudge((id) => id === "t1" || id === "t3");
    const matcher = new TwoStageEligibilityMatcher(judge, recordingLogger().logger);

    const confirmed = await matcher.matchEligible(profile, tenTargets, 0.35, 5, 3);

    assert.deepEqual(
      confirmed.map((match) => [match.target.id, match.similarity]),
      [
        ["t3", 0.8],
        ["t1", 0.6],
      ],
    );
    assert.deepEqual([...judge.judged].sort(), ["t1", "t3", "t5", "t7"]);
    assert.equal(confirmed[0].judgment.confidence, "high");
  });

  it("reports a state for every target", async () => {
    const judge = new ScriptedJudge((id) => id === "t5");
    const matcher = new TwoStageEligibilityMatcher(judge, recordingLogger().logger);

    const result = await matcher.run(profile, tenTargets, 0.35, 2, 3);

    const states = Object.fromEntries(result.outcomes.map((outcome) => [outcome.targetId, outcome.state]));
    assert.deepEqual(states, {
      t1: "not_reviewed",
      t2: "excluded",
      t3: "rejected",
      t4: "excluded",
      t5: "confirmed",
      t6: "excluded",
      t7: "not_reviewed",
      t8: "excluded",
      t9: "excluded",
      t10: "excluded",
    });
    assert.equal(result.outcomes[2].reason, "declined");
    assert.equal(result.outcomes[1].reason, "below_threshold");
    assert.equal(result.cancelled, false);
  });

  it("keeps a target whose similarity equals the threshold", async () => {
    const judge = new ScriptedJudge(() => true);
    const matcher = new TwoStageEligibilityMatcher(judge, recordingLogger().logger);

    const confirmed = await matcher.matchEligible(profile, [target("t1", [3, 4])], 0.6, 1, 1);

    assert.equal(confirmed.length, 1);
  });

  it("excludes inactive targets without judging them", async () => {
    const judge = new ScriptedJudge(() => true);
    const matcher = new TwoStageEligibilityMatcher(judge, recordingLogger().logger);

    const result = await matcher.run(
      profile,
      [target("open", [1, 0]), target("filled", [1, 0], { status: "filled" })],
      0.35,
      5,
      3,
    );

    assert.deepEqual(judge.judged, ["open"]);
    assert.equal(result.outcomes[1].state, "excluded");
    assert.equal(result.outcomes[1].reason, "status_filled");
    assert.equal(result.outcomes[1].similarity, null);
  });

  it("rejects targets whose review fails or times out, without retrying", async () => {
    const { logger, entries } = recordingLogger();
    const judge = new ScriptedJudge((id) => {
      if (id === "t5") {
        return new GatewayError("scripted_judge", "eligibility_review_v1_failed:json_parse_failed");
      }
      if (id === "t3") {
        return "hang";
      }
      return true;
    });
    const matcher = new TwoStageEligibilityMatcher(judge, logger);

    const result = await matcher.run(profile, tenTargets, 0.35, 5, 3, { timeoutMs: 30 });

    assert.deepEqual(
      result.confirmed.map((match) => match.target.id),
      ["t7", "t1"],
    );
    assert.equal(result.outcomes[4].state, "rejected");
    assert.equal(result.outcomes[4].reason, "gateway_error");
    assert.equal(result.outcomes[2].state, "rejected");
    assert.equal(result.outcomes[2].reason, "gateway_timeout");
    assert.equal(judge.judged.filter((id) => id === "t5").length, 1);
    assert.equal(
      entries.filter((entry) => entry.message === "Eligibility review failed, rejecting target").length,
      2,
    );
  });

  it("rejects a target when the judgment is attributed to another id", async () => {
    const misattributing: JudgmentGateway = {
      name: "misattributing",
      async selectIndices() {
        return [];
      },
      async judge() {
        return [{ candidateId: "someone-else", accept: true, confidence: "high", score: 90, reasoning: "" }];
      },
    };
    const matcher = new TwoStageEligibilityMatcher(misattributing, recordingLogger().logger);

    const result = await matcher.run(profile, [target("t5", [1, 0])], 0.35, 5, 3);

    assert.deepEqual(result.confirmed, []);
    assert.equal(result.outcomes[0].state, "rejected");
  });

  it("truncates confirmed matches to finalCap", async () => {
    const matcher = new TwoStageEligibilityMatcher(new ScriptedJudge(() => true), recordingLogger().logger);

    const confirmed = await matcher.matchEligible(profile, tenTargets, 0.35, 5, 2);

    assert.deepEqual(
      confirmed.map((match) => match.target.id),
      ["t5", "t3"],
    );
  });

  it("bounds concurrent reviews", async () => {
    const judge = new ScriptedJudge(() => true);
    const matcher = new TwoStageEligibilityMatcher(judge, recordingLogger().logger);

    await matcher.run(profile, tenTargets, 0.35, 5, 5, { concurrency: 2 });

    assert.equal(judge.peak, 2);
  });

  it("keeps finished reviews and cancels the rest when aborted", async () => {
    const controller = new AbortController();
    const judge = new ScriptedJudge(
      () => true,
      (id) => {
        if (id === "t5") {
          controller.abort();
        }
      },
    );
    const matcher = new TwoStageEligibilityMatcher(judge, recordingLogger().logger);

    const result = await matcher.run(profile, tenTargets, 0.35, 5, 3, {
      concurrency: 1,
      signal: controller.signal,
    });

    assert.equal(result.cancelled, true);
    assert.deepEqual(
      result.confirmed.map((match) => match.target.id),
      ["t5"],
    );
    assert.equal(result.outcomes[2].state, "cancelled");
    assert.equal(result.outcomes[6].state, "cancelled");
    assert.equal(result.outcomes[0].state, "cancelled");
  });

  it("embeds targets without a stored embedding", async () => {
    const texts: string[] = [];
    const embedder: TargetEmbedder = {
      async embed(text) {
        texts.push(text);
        return [1, 0];
      },
    };
    const matcher = new TwoStageEligibilityMatcher(new ScriptedJudge(() => true), recordingLogger().logger, embedder);

    const confirmed = await matcher.matchEligible(profile, [target("fresh", undefined)], 0.35, 5, 3);

    assert.equal(confirmed[0].similarity, 1);
    assert.deepEqual(texts, ["Title: Role fresh\nRequired: TypeScript\nBuild services."]);
  });

  it("excludes targets whose embedding cannot be produced", async () => {
    const { logger, entries } = recordingLogger();
    const embedder: TargetEmbedder = {
      async embed() {
        throw new Error("Embeddings API error: HTTP 500 - upstream");
      },
    };
    const matcher = new TwoStageEligibilityMatcher(new ScriptedJudge(() => true), logger, embedder);

    const result = await matcher.run(profile, [target("broken", undefined), target("ok", [1, 0])], 0.35, 5, 3);

    assert.equal(result.outcomes[0].state, "excluded");
    assert.equal(result.outcomes[0].reason, "embedding_failed");
    assert.deepEqual(
      result.confirmed.map((match) => match.target.id),
      ["ok"],
    );
    assert.equal(entries.filter((entry) => entry.level === "warn").length, 1);
  });

  it("fails on vectors of different dimension", async () => {
    const matcher = new TwoStageEligibilityMatcher(new ScriptedJudge(() => true), recordingLogger().logger);
    await assert.rejects(matcher.matchEligible(profile, [target("wide", [1, 0, 0])], 0.35, 5, 3), DimensionMismatchError);
  });

  it("requires a primary profile vector", async () => {
    const matcher = new TwoStageEligibilityMatcher(new ScriptedJudge(() => true), recordingLogger().logger);
    await assert.rejects(
      matcher.matchEligible({ ...profile, vectors: [] }, tenTargets, 0.35, 5, 3),
      MissingEmbeddingError,
    );
  });

  it("validates threshold and caps", async () => {
    const matcher = new TwoStageEligibilityMatcher(new ScriptedJudge(() => true), recordingLogger().logger);
    await assert.rejects(matcher.matchEligible(profile, tenTargets, 1.2, 5, 3), InvalidParameterError);
    await assert.rejects(matcher.matchEligible(profile, tenTargets, 0.35, 0, 3), InvalidParameterError);
    await assert.rejects(matcher.matchEligible(profile, tenTargets, 0.35, 5, 0), InvalidParameterError);
  });
});

describe("buildTargetEmbeddingText", () => {
  it("lists fields in a fixed order and skips empty ones", () => {
    const text = buildTargetEmbeddingText({
      id: "x",
      title: "Senior Platform Engineer",
      company: "Example Co",
      status: "active",
      seniority: "senior",
      location: "Berlin, Germany, Hybrid",
      requiredCompetencies: ["Go", "Kubernetes"],
      optionalCompetencies: ["Terraform"],
      description: " Run the platform. ",
    });
    assert.equal(
      text,
      [
        "Title: Senior Platform Engineer",
        "Company: Example Co",
        "Seniority: senior",
        "Location: Berlin, Germany, Hybrid",
        "Required: Go, Kubernetes",
        "Nice to have: Terraform",
        "Run the platform.",
      ].join("\n"),
    );
  });
});
