// server/src/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import morgan from "morgan";

import type { TriviaEngine } from "./services/triviaEngine";
import categoryRoutes from "./routes/categoryRoutes";
import questionsRoutes from "./routes/questionsRoutes";
import quizRoutes from "./routes/quizRoutes";
import { HttpError } from "./utils/errors";
import { errorHandler, notFoundHandler, zodErrorHandler } from "./middleware/errorHandlers";

export type AppOptions = {
  engine: TriviaEngine;
  corsOrigins?: string[];
  rateLimitMax?: number;
  logRequests?: boolean;
};

export function createApp({ engine, corsOrigins = [], rateLimitMax = 100, logRequests = true }: AppOptions) {
  const app = express();

  // empty allow list = any origin
  app.use(
    cors({
      origin: (origin, cb) => {
        if (!origin || corsOrigins.length === 0 || corsOrigins.includes(origin)) return cb(null, true);
        return cb(new HttpError(403, `Origin ${origin} is not allowed by CORS`));
      },
      allowedHeaders: ["Content-Type", "Authorization"],
      methods: ["GET", "PATCH", "POST", "DELETE", "OPTIONS"],
    })
  );
  app.use(helmet());
  app.use(express.json({ limit: "100kb" }));
  app.use(rateLimit({ windowMs: 60_000, max: rateLimitMax, standardHeaders: true }));
  if (logRequests) app.use(morgan("dev"));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/categories", categoryRoutes(engine));
  app.use("/questions", questionsRoutes(engine));
  app.use("/quizzes", quizRoutes(engine));

  app.use(notFoundHandler);
  app.use(zodErrorHandler);
  app.use(errorHandler);

  return app;
}
