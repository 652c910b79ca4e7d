import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { QdrantClient } from "../../matching/qdrant.client";
import { GatewayError } from "../../shared/errors";
import { fakeFetch, jsonResponse, parseBody, recordingLogger } from "../helpers/fakes";

const config = {
  baseUrl: "https://qdrant.example.com/",
  apiKey: "test-key",
  passageCollection: "blog_passages_v1",
};

const points = [
  {
    id: 1,
    score: 0.82,
    payload: { document_id: 10, chunk_text: " first chunk ", title: "Kafka", url: "https://blog.example.com/kafka", author: "Ana" },
  },
  { id: 2, score: 0.3, payload: { document_id: "11", title: "Low", url: "https://blog.example.com/low" } },
  { id: 3, score: 0.91, payload: { document_id: "12", chunk_text: "no metadata" } },
  { id: 4, score: 0.95, payload: {} },
];

describe("QdrantClient.search", () => {
  it("posts to points/search and maps payloads to passage hits", async () => {
    const { fetchImpl, requests } = fakeFetch(() => jsonResponse(200, { result: points }));
    const client = new QdrantClient(config, recordingLogger().logger, fetchImpl);

    const hits = await client.search({ vector: [0.1, 0.2], threshold: 0.5, limit: 20 });

    assert.equal(requests[0].url, "https://qdrant.example.com/collections/blog_passages_v1/points/search");
    assert.equal(requests[0].init.headers["api-key"], "test-key");
    assert.deepEqual(parseBody(requests[0]), {
      vector: [0.1, 0.2],
      limit: 20,
      score_threshold: 0.5,
      with_payload: true,
      with_vector: false,
    });
    assert.deepEqual(hits, [
      { targetId: "12", score: 0.91, snippet: "no metadata", document: undefined },
      {
        targetId: "10",
        score: 0.82,
        snippet: "first chunk",
        document: {
          id: "10",
          title: "Kafka",
          url: "https://blog.example.com/kafka",
          author: "Ana",
          publishedDate: undefined,
          featuredImage: undefined,
        },
      },
    ]);
  });

  it("falls back to points/query when points/search is rejected", async () => {
    const { fetchImpl, requests } = fakeFetch((url) =>
      url.endsWith("/points/search") ? jsonResponse(404, "not found") : jsonResponse(200, { result: { points: points.slice(0, 1) } }),
    );
    const client = new QdrantClient(config, recordingLogger().logger, fetchImpl);

    const hits = await client.search({ vector: [1], threshold: 0.5, limit: 5 });

    assert.equal(requests.length, 2);
    assert.equal(parseBody(requests[1]).query !== undefined, true);
    assert.deepEqual(
      hits.map((hit) => hit.targetId),
      ["10"],
    );
  });

  it("throws GatewayError when both endpoints fail", async () => {
    const { fetchImpl } = fakeFetch(() => jsonResponse(500, "boom"));
    const client = new QdrantClient(config, recordingLogger().logger, fetchImpl);

    await assert.rejects(client.search({ vector: [1], threshold: 0.5, limit: 5 }), {
      name: "GatewayError",
      message: "qdrant: search failed: HTTP 500 - boom",
    });
  });

  it("throws when the client is not configured", async () => {
    const { fetchImpl, requests } = fakeFetch(() => jsonResponse(200, { result: [] }));
    const client = new QdrantClient({ passageCollection: "blog_passages_v1" }, recordingLogger().logger, fetchImpl);

    assert.equal(client.isEnabled(), false);
    await assert.rejects(client.search({ vector: [1], threshold: 0.5, limit: 5 }), GatewayError);
    assert.equal(requests.length, 0);
  });

  it("uses the url as the title when the payload has none", async () => {
    const { fetchImpl } = fakeFetch(() =>
      jsonResponse(200, { result: [{ id: 9, score: 0.7, payload: { document_id: "21", url: "https://blog.example.com/untitled" } }] }),
    );
    const client = new QdrantClient(config, recordingLogger().logger, fetchImpl);

    const hits = await client.search({ vector: [1], threshold: 0.5, limit: 5 });

    assert.deepEqual(hits[0].document, {
      id: "21",
      title: "https://blog.example.com/untitled",
      url: "https://blog.example.com/untitled",
      author: undefined,
      publishedDate: undefined,
      featuredImage: undefined,
    });
  });

  it("caps the requested limit", async () => {
    const { fetchImpl, requests } = fakeFetch(() => jsonResponse(200, { result: [] }));
    const client = new QdrantClient(config, recordingLogger().logger, fetchImpl);

    await client.search({ vector: [1], threshold: 0.5, limit: 10_000 });

    assert.equal(parseBody(requests[0]).limit, 500);
  });
});
