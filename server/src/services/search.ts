import type { Question } from "../types/trivia";

/** Questions whose text contains `term`, ignoring case. Keeps input order; "" matches all. */
export function search(items: readonly Question[], term: string): Question[] {
  const needle = term.toLowerCase();
  return items.filter((q) => q.question.toLowerCase().includes(needle));
}
