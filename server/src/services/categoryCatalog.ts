import type { Category } from "../types/trivia";
import type { QuestionRepository } from "../repositories/questionRepository";
import { Err, Ok, type Result } from "../utils/result";
import { notFound } from "../utils/errors";

/** Read-only category lookup. An empty catalog is reported as NotFound. */
export class CategoryCatalog {
  constructor(private readonly repo: QuestionRepository) {}

  async listAll(): Promise<Result<Category[]>> {
    const categories = await this.repo.listCategories();
    if (categories.length === 0) return Err(notFound());
    return Ok(categories);
  }

  async labelsOnly(): Promise<Result<string[]>> {
    const all = await this.listAll();
    if (!all.ok) return all;
    return Ok(all.value.map((c) => c.label));
  }
}
