import { Router } from "express";
import type { TriviaEngine } from "../services/triviaEngine";
import { quizControllers } from "../controllers/quizControllers";

export default function quizRoutes(engine: TriviaEngine): Router {
  const router = Router();
  const c = quizControllers(engine);

  router.post("/", c.nextQuizQuestion);

  return router;
}
