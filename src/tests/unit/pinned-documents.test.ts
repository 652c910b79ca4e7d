import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { applyPinnedDocuments, DocumentLookup } from "../../matching/pinned-documents";
import { DocumentRef } from "../../shared/types/matching.types";
import { makeMatch, recordingLogger } from "../helpers/fakes";

const pool = [makeMatch("a", 0.9), makeMatch("b", 0.8), makeMatch("c", 0.7), makeMatch("d", 0.6)];
const selection = [pool[0], pool[1], pool[2]];

describe("applyPinnedDocuments", () => {
  it("returns the selection truncated to finalCount when nothing is pinned", async () => {
    const result = await applyPinnedDocuments(selection, [], 2);
    assert.deepEqual(
      result.map((match) => match.document.id),
      ["a", "b"],
    );
  });

  it("puts pinned documents first and removes them from the ranked tail", async () => {
    const result = await applyPinnedDocuments(selection, ["d", "https://blog.example.com/b"], 3, { pool });

    assert.deepEqual(
      result.map((match) => [match.document.id, match.score, match.sourceField]),
      [
        ["d", 0.6, "pinned"],
        ["b", 0.8, "pinned"],
        ["a", 0.9, "professional"],
      ],
    );
  });

  it("resolves unknown references through the lookup with a score of 0", async () => {
    const requested: string[][] = [];
    const lookup: DocumentLookup = {
      async findByReferences(references) {
        requested.push([...references]);
        const document: DocumentRef = { id: "77", title: "Pinned guide", url: "https://blog.example.com/guide" };
        return [document];
      },
    };

    const result = await applyPinnedDocuments(selection, ["https://blog.example.com/guide", "a"], 3, { pool, lookup });

    assert.deepEqual(requested, [["https://blog.example.com/guide"]]);
    assert.deepEqual(
      result.map((match) => [match.document.id, match.score]),
      [
        ["77", 0],
        ["a", 0.9],
        ["b", 0.8],
      ],
    );
  });

  it("skips unresolved references with a warning", async () => {
    const { logger, entries } = recordingLogger();
    const result = await applyPinnedDocuments(selection, ["missing"], 2, { pool, logger });

    assert.deepEqual(
      result.map((match) => match.document.id),
      ["a", "b"],
    );
    assert.deepEqual(entries, [
      { level: "warn", message: "Pinned document not found, skipping", meta: { reference: "missing" } },
    ]);
  });

  it("keeps every pinned document even beyond finalCount", async () => {
    const result = await applyPinnedDocuments(selection, ["c", "b", "a"], 2, { pool });
    assert.deepEqual(
      result.map((match) => match.document.id),
      ["c", "b", "a"],
    );
  });

  it("deduplicates references that point to the same document", async () => {
    const result = await applyPinnedDocuments(selection, ["b", "https://blog.example.com/b", " b "], 2, { pool });
    assert.deepEqual(
      result.map((match) => match.document.id),
      ["b", "a"],
    );
  });

  it("treats a failing lookup as unresolved", async () => {
    const { logger, entries } = recordingLogger();
    const lookup: DocumentLookup = {
      async findByReferences() {
        throw new Error("Supabase select failed: HTTP 500 - down");
      },
    };

    const result = await applyPinnedDocuments(selection, ["zzz"], 1, { pool, lookup, logger });

    assert.deepEqual(
      result.map((match) => match.document.id),
      ["a"],
    );
    assert.deepEqual(
      entries.map((entry) => entry.message),
      ["Pinned document lookup failed", "Pinned document not found, skipping"],
    );
  });
});
