import type { Category, InsertQuestion, Question } from "../types/trivia";
import type { Result } from "../utils/result";
import { validationError, type TriviaError } from "../utils/errors";

/**
 * Storage contract the engine reads through. Implementations own ordering
 * (listing order is ascending id) and must serialize insert/delete.
 */
export interface QuestionRepository {
  listAll(): Promise<Question[]>;
  findByCategory(categoryId: number): Promise<Question[]>;
  /** case-insensitive substring match on question text */
  findByTextSubstring(term: string): Promise<Question[]>;
  get(id: number): Promise<Question | null>;
  /** Assigns the id. ValidationError on empty fields or an unknown category. */
  insert(fields: InsertQuestion): Promise<Result<Question>>;
  /** true when a record existed and was removed */
  delete(id: number): Promise<boolean>;
  listCategories(): Promise<Category[]>;
}

/** Field checks shared by every implementation; category existence is checked by the caller. */
export function checkInsertFields(fields: InsertQuestion): TriviaError | null {
  if (fields.question.trim() === "") return validationError("question is required");
  if (fields.answer.trim() === "") return validationError("answer is required");
  if (!Number.isInteger(fields.difficulty) || fields.difficulty < 1 || fields.difficulty > 5) {
    return validationError("difficulty must be an integer between 1 and 5");
  }
  if (!Number.isInteger(fields.category) || fields.category < 1) {
    return validationError("category must be a positive integer");
  }
  return null;
}
