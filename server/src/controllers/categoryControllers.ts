import type { TriviaEngine } from "../services/triviaEngine";
import { CategoryParamSchema } from "../schemas/triviaSchemas";
import { send, type Handler } from "../utils/respond";

export function categoryControllers(engine: TriviaEngine) {
  /** GET /categories -> { categories: { [id]: label } } */
  const listCategories: Handler = async (_req, res, next) => {
    try {
      const result = await engine.listCategories();
      send(res, result, (categories) => ({
        categories: Object.fromEntries(categories.map((c) => [String(c.id), c.label])),
      }));
    } catch (err) {
      next(err);
    }
  };

  /** GET /categories/:id/questions */
  const listByCategory: Handler = async (req, res, next) => {
    try {
      const { id } = CategoryParamSchema.parse(req.params);
      const result = await engine.listByCategory(id);
      send(res, result, (v) => ({
        questions: v.questions,
        total_questions: v.totalQuestions,
        current_category: v.currentCategory,
      }));
    } catch (err) {
      next(err);
    }
  };

  return { listCategories, listByCategory };
}
