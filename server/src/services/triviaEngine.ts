import type {
  Category,
  CategoryResult,
  CreateResult,
  DeleteResult,
  FormattedQuestion,
  NewQuestionInput,
  PageResult,
  Question,
  RandomSource,
  SearchResult,
} from "../types/trivia";
import type { QuestionRepository } from "../repositories/questionRepository";
import { Err, Ok, type Result } from "../utils/result";
import { invalidRequest, notFound, unprocessable } from "../utils/errors";
import { CategoryCatalog } from "./categoryCatalog";
import { QUESTIONS_PER_PAGE, isValidPage, paginate } from "./paginator";
import { QuizSelector } from "./quizSelector";
import { search } from "./search";

export type TriviaEngineOptions = {
  pageSize?: number;
  random?: RandomSource;
};

export function formatQuestion(q: Question): FormattedQuestion {
  return {
    id: q.id,
    question: q.question,
    answer: q.answer,
    category: q.category,
    difficulty: q.difficulty,
  };
}

/**
 * Query and selection operations over a question repository.
 * Holds no state between calls; every operation reads a fresh snapshot.
 */
export class TriviaEngine {
  readonly catalog: CategoryCatalog;
  readonly pageSize: number;
  private readonly quiz: QuizSelector;

  constructor(private readonly repo: QuestionRepository, opts: TriviaEngineOptions = {}) {
    this.catalog = new CategoryCatalog(repo);
    this.quiz = new QuizSelector(repo, opts.random);
    this.pageSize = opts.pageSize ?? QUESTIONS_PER_PAGE;
  }

  listCategories(): Promise<Result<Category[]>> {
    return this.guard("CATEGORIES", () => this.catalog.listAll());
  }

  categoryLabels(): Promise<Result<string[]>> {
    return this.guard("CATEGORIES", () => this.catalog.labelsOnly());
  }

  /** NotFound covers both an empty store and a page past the last one. */
  listQuestionsPage(page = 1, pageSize = this.pageSize): Promise<Result<PageResult>> {
    if (!isValidPage(page, pageSize)) return Promise.resolve(Err(invalidRequest()));

    return this.guard<PageResult>("LIST", async () => {
      const all = await this.repo.listAll();
      const questions = paginate(all.map(formatQuestion), page, pageSize);
      if (questions.length === 0) return Err(notFound());

      const labels = await this.catalog.labelsOnly();
      if (!labels.ok) return labels;

      return Ok({
        questions,
        totalQuestions: all.length,
        categories: labels.value,
        currentCategory: null,
      });
    });
  }

  createQuestion(input: NewQuestionInput, page = 1): Promise<Result<CreateResult>> {
    const { question, answer, category, difficulty } = input;
    if (question == null || answer == null || category == null || difficulty == null) {
      return Promise.resolve(Err(invalidRequest()));
    }
    if (!isValidPage(page, this.pageSize)) return Promise.resolve(Err(invalidRequest()));

    return this.guard<CreateResult>("CREATE", async () => {
      const inserted = await this.repo.insert({ question, answer, category, difficulty });
      if (!inserted.ok) {
        console.error("[CREATE] rejected:", inserted.error.message);
        return Err(unprocessable(inserted.error));
      }

      const created = inserted.value;
      return Ok({
        created: created.id,
        questionCreated: created.question,
        questions: await this.pageOf(page),
      });
    });
  }

  /** Repository narrows by text, the matcher has the final say. */
  searchQuestions(term: string): Promise<Result<SearchResult>> {
    return this.guard<SearchResult>("SEARCH", async () => {
      const candidates = await this.repo.findByTextSubstring(term);
      const matched = search(candidates, term).map(formatQuestion);
      if (matched.length === 0) return Err(notFound());

      return Ok({
        questions: matched,
        totalQuestions: matched.length,
        currentCategory: null,
      });
    });
  }

  deleteQuestion(id: number, page = 1): Promise<Result<DeleteResult>> {
    if (!isValidPage(page, this.pageSize)) return Promise.resolve(Err(invalidRequest()));

    return this.guard<DeleteResult>("DELETE", async () => {
      const existing = await this.repo.get(id);
      if (!existing) return Err(notFound());

      const removed = await this.repo.delete(id);
      if (!removed) {
        console.error(`[DELETE] question ${id} vanished before delete`);
        return Err(unprocessable());
      }
      return Ok({ deleted: id, questions: await this.pageOf(page) });
    });
  }

  /** An unknown category and an empty one both come back as NotFound. */
  listByCategory(categoryId: number): Promise<Result<CategoryResult>> {
    return this.guard<CategoryResult>("CATEGORY", async () => {
      const questions = (await this.repo.findByCategory(categoryId)).map(formatQuestion);
      if (questions.length === 0) return Err(notFound());

      return Ok({
        questions,
        totalQuestions: questions.length,
        currentCategory: String(categoryId),
      });
    });
  }

  nextQuestion(
    categoryId: number,
    previousIds: Iterable<number>
  ): Promise<Result<FormattedQuestion | null>> {
    return this.guard<FormattedQuestion | null>("QUIZ", async () => {
      const next = await this.quiz.nextQuestion(categoryId, previousIds);
      if (!next.ok) return next;
      return Ok(next.value ? formatQuestion(next.value) : null);
    });
  }

  /** A repository that throws, on reads or writes, yields UnprocessableEntity. */
  private async guard<T>(tag: string, op: () => Promise<Result<T>>): Promise<Result<T>> {
    try {
      return await op();
    } catch (err) {
      console.error(`[${tag}] failed:`, err);
      return Err(unprocessable(err));
    }
  }

  private async pageOf(page: number): Promise<FormattedQuestion[]> {
    const all = await this.repo.listAll();
    return paginate(all.map(formatQuestion), page, this.pageSize);
  }
}
