import { Router } from "express";
import type { TriviaEngine } from "../services/triviaEngine";
import { categoryControllers } from "../controllers/categoryControllers";

export default function categoryRoutes(engine: TriviaEngine): Router {
  const router = Router();
  const c = categoryControllers(engine);

  router.get("/", c.listCategories);
  router.get("/:id/questions", c.listByCategory);

  return router;
}
