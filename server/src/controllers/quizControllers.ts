import type { TriviaEngine } from "../services/triviaEngine";
import { QuizSchema } from "../schemas/triviaSchemas";
import { send, type Handler } from "../utils/respond";

export function quizControllers(engine: TriviaEngine) {
  /** POST /quizzes { previous_questions, quiz_category: { id } } -> { question | null } */
  const nextQuizQuestion: Handler = async (req, res, next) => {
    try {
      const body = QuizSchema.parse(req.body ?? {});
      const result = await engine.nextQuestion(body.quiz_category.id, body.previous_questions);
      send(res, result, (question) => ({ question }));
    } catch (err) {
      next(err);
    }
  };

  return { nextQuizQuestion };
}
