import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { LlmCallOptions, LlmClient, StructuredJsonClient } from "../../ai/llm.client";
import { callJsonPromptSafe, isRecord, parseJsonObject } from "../../ai/llm.safe";
import { noopLogger } from "../../config/logger";

class QueueClient implements StructuredJsonClient {
  readonly promptNames: Array<string | undefined> = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async generateStructuredJson(_prompt: string, _maxTokens: number, options?: LlmCallOptions): Promise<string> {
    this.promptNames.push(options?.promptName);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error("no scripted reply left");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

interface Summary {
  summary: string;
}

const hasSummary = (value: Record<string, unknown>): value is Record<string, unknown> & Summary =>
  typeof value.summary === "string";

describe("parseJsonObject", () => {
  it("parses plain and fenced objects", () => {
    assert.deepEqual(parseJsonObject('{"a":1}'), { ok: true, data: { a: 1 } });
    assert.deepEqual(parseJsonObject('```\n{"a":2}\n```'), { ok: true, data: { a: 2 } });
  });

  it("rejects arrays, prose around the object and broken JSON", () => {
    assert.deepEqual(parseJsonObject("[1,2]"), { ok: false });
    assert.deepEqual(parseJsonObject('Sure! {"a":1}'), { ok: false });
    assert.deepEqual(parseJsonObject('{"a":}'), { ok: false });
  });
});

describe("isRecord", () => {
  it("accepts only plain objects", () => {
    assert.equal(isRecord({}), true);
    assert.equal(isRecord([]), false);
    assert.equal(isRecord(null), false);
  });
});

describe("callJsonPromptSafe", () => {
  it("returns validated data", async () => {
    const client = new QueueClient(['{"summary":"ok"}']);
    const result = await callJsonPromptSafe<Summary>({
      llmClient: client,
      prompt: "p",
      maxTokens: 50,
      promptName: "summary_v1",
      schemaHint: "summary",
      validate: hasSummary,
    });
    assert.deepEqual(result, { ok: true, data: { summary: "ok" } });
  });

  it("repairs malformed output once", async () => {
    const client = new QueueClient(["summary = ok", '{"summary":"fixed"}']);
    const result = await callJsonPromptSafe<Summary>({
      llmClient: client,
      prompt: "p",
      maxTokens: 50,
      promptName: "summary_v1",
      schemaHint: "summary",
      validate: hasSummary,
    });
    assert.deepEqual(result, { ok: true, data: { summary: "fixed" } });
    assert.deepEqual(client.promptNames, ["summary_v1", "summary_v1_json_repair"]);
  });

  it("reports schema_invalid when validation fails", async () => {
    const result = await callJsonPromptSafe<Summary>({
      llmClient: new QueueClient(['{"summary":3}']),
      prompt: "p",
      maxTokens: 50,
      promptName: "summary_v1",
      schemaHint: "summary",
      validate: hasSummary,
    });
    assert.deepEqual(result, { ok: false, error_code: "schema_invalid", raw: '{"summary":3}' });
  });

  it("reports llm_failure for non-transient errors without retrying", async () => {
    const client = new QueueClient([new Error("OpenAI API error: HTTP 401 - bad key")]);
    const result = await callJsonPromptSafe<Summary>({
      llmClient: client,
      prompt: "p",
      maxTokens: 50,
      promptName: "summary_v1",
      schemaHint: "summary",
      logger: noopLogger,
      validate: hasSummary,
    });
    assert.deepEqual(result, { ok: false, error_code: "llm_failure" });
    assert.equal(client.promptNames.length, 1);
  });
});

describe("LlmClient.buildJsonRequestBody", () => {
  it("uses max_tokens for chat models and max_completion_tokens for reasoning models", () => {
    const chat = new LlmClient("test-key", noopLogger, "gpt-4o-mini").buildJsonRequestBody("hi", 100);
    const reasoning = new LlmClient("test-key", noopLogger, "o3-mini").buildJsonRequestBody("hi", 100);

    assert.equal(chat.max_tokens, 100);
    assert.equal(chat.max_completion_tokens, undefined);
    assert.equal(reasoning.max_completion_tokens, 100);
    assert.equal(reasoning.max_tokens, undefined);
    assert.deepEqual(chat.response_format, { type: "json_object" });
    assert.equal(chat.messages[1].content, "hi");
  });
});
