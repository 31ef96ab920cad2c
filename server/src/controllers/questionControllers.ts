import type { TriviaEngine } from "../services/triviaEngine";
import {
  CreateQuestionSchema,
  IdParamSchema,
  PageQuerySchema,
  SearchSchema,
} from "../schemas/triviaSchemas";
import { send, type Handler } from "../utils/respond";

export function questionControllers(engine: TriviaEngine) {
  /** GET /questions?page=n */
  const listQuestions: Handler = async (req, res, next) => {
    try {
      const { page } = PageQuerySchema.parse(req.query);
      const result = await engine.listQuestionsPage(page);
      send(res, result, (v) => ({
        questions: v.questions,
        total_questions: v.totalQuestions,
        categories: v.categories,
        current_category: v.currentCategory,
      }));
    } catch (err) {
      next(err);
    }
  };

  /** POST /questions { question, answer, category, difficulty } */
  const createQuestion: Handler = async (req, res, next) => {
    try {
      const body = CreateQuestionSchema.parse(req.body ?? {});
      const { page } = PageQuerySchema.parse(req.query);
      const result = await engine.createQuestion(body, page);
      send(res, result, (v) => ({
        created: v.created,
        question_created: v.questionCreated,
        questions: v.questions,
      }));
    } catch (err) {
      next(err);
    }
  };

  /** POST /questions/search { searchTerm } */
  const searchQuestions: Handler = async (req, res, next) => {
    try {
      const { searchTerm } = SearchSchema.parse(req.body ?? {});
      const result = await engine.searchQuestions(searchTerm);
      send(res, result, (v) => ({
        questions: v.questions,
        total_questions: v.totalQuestions,
        current_category: v.currentCategory,
      }));
    } catch (err) {
      next(err);
    }
  };

  /** DELETE /questions/:id */
  const deleteQuestion: Handler = async (req, res, next) => {
    try {
      const { id } = IdParamSchema.parse(req.params);
      const { page } = PageQuerySchema.parse(req.query);
      const result = await engine.deleteQuestion(id, page);
      send(res, result, (v) => ({ deleted: v.deleted, questions: v.questions }));
    } catch (err) {
      next(err);
    }
  };

  return { listQuestions, createQuestion, searchQuestions, deleteQuestion };
}
