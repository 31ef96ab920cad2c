import type { Question, RandomSource } from "../types/trivia";
import type { QuestionRepository } from "../repositories/questionRepository";
import { Err, Ok, type Result } from "../utils/result";
import { notFound } from "../utils/errors";

/** category id that means "every category" */
export const ALL_CATEGORIES = 0;

/** Uniform pick among pool questions not yet asked; null once all are used. */
export function pickUnseen(
  pool: readonly Question[],
  previousIds: ReadonlySet<number>,
  random: RandomSource
): Question | null {
  const unseen = pool.filter((q) => !previousIds.has(q.id));
  if (unseen.length === 0) return null;

  // random() may return values arbitrarily close to 1
  const index = Math.min(unseen.length - 1, Math.floor(random() * unseen.length));
  return unseen[index];
}

export class QuizSelector {
  constructor(
    private readonly repo: QuestionRepository,
    private readonly random: RandomSource = Math.random
  ) {}

  /**
   * Next quiz question for `categoryId` (0 = all).
   * NotFound when the pool is empty; Ok(null) when every pooled id was already asked.
   */
  async nextQuestion(
    categoryId: number,
    previousIds: Iterable<number>
  ): Promise<Result<Question | null>> {
    const pool =
      categoryId === ALL_CATEGORIES
        ? await this.repo.listAll()
        : await this.repo.findByCategory(categoryId);

    if (pool.length === 0) return Err(notFound());

    return Ok(pickUnseen(pool, new Set(previousIds), this.random));
  }
}
