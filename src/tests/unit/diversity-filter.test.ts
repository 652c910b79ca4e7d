import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { filterDiverse, isGeneric } from "../../matching/diversity-filter";
import { InvalidParameterError } from "../../shared/errors";
import { makeMatch } from "../helpers/fakes";

describe("filterDiverse", () => {
  const pool = [
    makeMatch("1", 0.95, "Life at Acme: a week on the platform team"),
    makeMatch("2", 0.9, "Designing idempotent payment APIs"),
    makeMatch("3", 0.85, "Careers in data engineering"),
    makeMatch("4", 0.8, "Postgres partitioning at scale"),
    makeMatch("5", 0.75, "Our CULTURE of code review"),
  ];

  it("prefers specific titles before generic ones", () => {
    const selected = filterDiverse(pool, 2);
    assert.deepEqual(
      selected.map((match) => match.document.id),
      ["2", "4"],
    );
  });

  it("backfills with generic titles in their original order", () => {
    const selected = filterDiverse(pool, 4);
    assert.deepEqual(
      selected.map((match) => match.document.id),
      ["2", "4", "1", "3"],
    );
  });

  it("returns min(targetCount, matches.length) items", () => {
    assert.equal(filterDiverse(pool, 10).length, 5);
    assert.deepEqual(filterDiverse([], 3), []);
    assert.deepEqual(filterDiverse(pool, 0), []);
  });

  it("accepts custom markers", () => {
    const selected = filterDiverse(pool, 2, ["payment", "POSTGRES"]);
    assert.deepEqual(
      selected.map((match) => match.document.id),
      ["1", "3"],
    );
  });

  it("is deterministic and does not mutate its input", () => {
    const before = pool.map((match) => match.document.id);
    assert.deepEqual(filterDiverse(pool, 3), filterDiverse(pool, 3));
    assert.deepEqual(
      pool.map((match) => match.document.id),
      before,
    );
  });

  it("rejects a negative target count", () => {
    assert.throws(() => filterDiverse(pool, -1), InvalidParameterError);
  });
});

describe("isGeneric", () => {
  it("matches markers case-insensitively as substrings", () => {
    assert.equal(isGeneric("Meet the Engineers behind search", ["meet the engineers"]), true);
    assert.equal(isGeneric("Teamwork in incident response", ["team"]), true);
    assert.equal(isGeneric("Query planning deep dive", ["team"]), false);
  });
});
