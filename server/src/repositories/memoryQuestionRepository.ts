import type { Category, InsertQuestion, Question } from "../types/trivia";
import { Err, Ok, type Result } from "../utils/result";
import { validationError } from "../utils/errors";
import { checkInsertFields, type QuestionRepository } from "./questionRepository";

export type MemorySeed = {
  categories: Category[];
  questions: InsertQuestion[];
};

/** Process-local store. Ids come from a counter that only moves forward. */
export class MemoryQuestionRepository implements QuestionRepository {
  private readonly categories: Category[];
  private readonly questions = new Map<number, Question>();
  private nextId = 1;

  constructor(seed: MemorySeed = { categories: [], questions: [] }) {
    this.categories = [...seed.categories].sort((a, b) => a.id - b.id);
    for (const q of seed.questions) {
      const id = this.nextId++;
      this.questions.set(id, { ...q, id });
    }
  }

  async listAll(): Promise<Question[]> {
    return [...this.questions.values()].sort((a, b) => a.id - b.id);
  }

  async findByCategory(categoryId: number): Promise<Question[]> {
    const all = await this.listAll();
    return all.filter((q) => q.category === categoryId);
  }

  async findByTextSubstring(term: string): Promise<Question[]> {
    const needle = term.toLowerCase();
    const all = await this.listAll();
    return all.filter((q) => q.question.toLowerCase().includes(needle));
  }

  async get(id: number): Promise<Question | null> {
    return this.questions.get(id) ?? null;
  }

  async insert(fields: InsertQuestion): Promise<Result<Question>> {
    const invalid = checkInsertFields(fields);
    if (invalid) return Err(invalid);
    if (!this.categories.some((c) => c.id === fields.category)) {
      return Err(validationError(`category ${fields.category} does not exist`));
    }

    const created: Question = { ...fields, id: this.nextId++ };
    this.questions.set(created.id, created);
    return Ok(created);
  }

  async delete(id: number): Promise<boolean> {
    return this.questions.delete(id);
  }

  async listCategories(): Promise<Category[]> {
    return [...this.categories];
  }
}
