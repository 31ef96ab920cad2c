import { Router } from "express";
import type { TriviaEngine } from "../services/triviaEngine";
import { questionControllers } from "../controllers/questionControllers";

export default function questionsRoutes(engine: TriviaEngine): Router {
  const router = Router();
  const c = questionControllers(engine);

  router.get("/", c.listQuestions);
  router.post("/", c.createQuestion);
  router.post("/search", c.searchQuestions);
  router.delete("/:id", c.deleteQuestion);

  return router;
}
