import { z } from "zod";
import type { QueryResultRow } from "pg";
import type { Category, InsertQuestion, Question } from "../types/trivia";
import { Err, Ok, type Result } from "../utils/result";
import { validationError } from "../utils/errors";
import { checkInsertFields, type QuestionRepository } from "./questionRepository";

/** The slice of pg's Pool/PoolClient this repository needs */
export type Queryable = {
  query: (
    text: string,
    params?: unknown[]
  ) => Promise<{ rows: QueryResultRow[]; rowCount: number | null }>;
};

const QuestionRow = z.object({
  id: z.coerce.number().int(),
  question: z.string(),
  answer: z.string(),
  category: z.coerce.number().int(),
  difficulty: z.coerce.number().int(),
});

const CategoryRow = z.object({
  id: z.coerce.number().int(),
  type: z.string(),
});

const COLUMNS = "id, question, answer, category, difficulty";

const FK_VIOLATION = "23503";

/** Escapes LIKE wildcards so the term is matched literally */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (c) => `\\${c}`);
}

function isPgError(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

export class PgQuestionRepository implements QuestionRepository {
  constructor(private readonly db: Queryable) {}

  private async questions(sql: string, params: unknown[] = []): Promise<Question[]> {
    const { rows } = await this.db.query(sql, params);
    return rows.map((r) => QuestionRow.parse(r));
  }

  listAll(): Promise<Question[]> {
    return this.questions(`SELECT ${COLUMNS} FROM questions ORDER BY id ASC`);
  }

  findByCategory(categoryId: number): Promise<Question[]> {
    return this.questions(
      `SELECT ${COLUMNS} FROM questions WHERE category = $1 ORDER BY id ASC`,
      [categoryId]
    );
  }

  findByTextSubstring(term: string): Promise<Question[]> {
    return this.questions(
      `SELECT ${COLUMNS} FROM questions
        WHERE question ILIKE $1 ESCAPE '\\'
        ORDER BY id ASC`,
      [`%${escapeLike(term)}%`]
    );
  }

  async get(id: number): Promise<Question | null> {
    const rows = await this.questions(`SELECT ${COLUMNS} FROM questions WHERE id = $1`, [id]);
    return rows[0] ?? null;
  }

  async insert(fields: InsertQuestion): Promise<Result<Question>> {
    const invalid = checkInsertFields(fields);
    if (invalid) return Err(invalid);

    const exists = await this.db.query(`SELECT 1 FROM categories WHERE id = $1`, [fields.category]);
    if (!exists.rowCount) {
      return Err(validationError(`category ${fields.category} does not exist`));
    }

    try {
      const rows = await this.questions(
        `INSERT INTO questions (question, answer, category, difficulty)
         VALUES ($1, $2, $3, $4)
         RETURNING ${COLUMNS}`,
        [fields.question, fields.answer, fields.category, fields.difficulty]
      );
      return Ok(rows[0]);
    } catch (err) {
      // category removed between the check and the insert
      if (isPgError(err, FK_VIOLATION)) {
        return Err(validationError(`category ${fields.category} does not exist`));
      }
      throw err;
    }
  }

  async delete(id: number): Promise<boolean> {
    const r = await this.db.query(`DELETE FROM questions WHERE id = $1`, [id]);
    return (r.rowCount ?? 0) > 0;
  }

  async listCategories(): Promise<Category[]> {
    const { rows } = await this.db.query(`SELECT id, type FROM categories ORDER BY id ASC`);
    return rows.map((r) => {
      const row = CategoryRow.parse(r);
      return { id: row.id, label: row.type };
    });
  }
}
