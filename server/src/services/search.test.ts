import { describe, it, expect } from "vitest";
import { search } from "./search";
import type { Question } from "../types/trivia";
import { QUESTIONS } from "../testing/triviaFixtures";

const items: Question[] = QUESTIONS.map((q, i) => ({ ...q, id: i + 1 }));

describe("search", () => {
  it("matches case-insensitively", () => {
    expect(search(items, "paris").map((q) => q.id)).toEqual([2, 9]);
  });

  it("looks at question text only", () => {
    // id 1 has "Paris" as its answer, not in the question
    expect(search(items, "paris").some((q) => q.id === 1)).toBe(false);
  });

  it("returns every item for an empty term", () => {
    expect(search(items, "")).toEqual(items);
  });

  it("keeps listing order", () => {
    expect(search(items, "mona lisa").map((q) => q.id)).toEqual([8, 9]);
  });

  it("returns nothing when no text contains the term", () => {
    expect(search(items, "zebra")).toEqual([]);
  });
});
