import { loadEnv } from "./config/env";
import { asQueryable, createPool, pingDb } from "./config/db";
import { loadSeed } from "./config/seed";
import { createApp } from "./app";
import { TriviaEngine } from "./services/triviaEngine";
import type { QuestionRepository } from "./repositories/questionRepository";
import { MemoryQuestionRepository } from "./repositories/memoryQuestionRepository";
import { PgQuestionRepository } from "./repositories/pgQuestionRepository";

async function main() {
  const env = loadEnv();

  let repo: QuestionRepository;
  let shutdown = async () => {};

  if (env.store === "memory") {
    repo = new MemoryQuestionRepository(loadSeed(env.seedFile));
    console.log(`[DB] in-memory store seeded from ${env.seedFile}`);
  } else {
    const pool = createPool(env.databaseUrl ?? "", env.pgSsl);
    const db = asQueryable(pool);
    console.log("[DB] connected at:", await pingDb(db));
    repo = new PgQuestionRepository(db);
    shutdown = () => pool.end();
  }

  const engine = new TriviaEngine(repo, { pageSize: env.pageSize });
  const app = createApp({ engine, corsOrigins: env.corsOrigins, rateLimitMax: env.rateLimitMax });

  const server = app.listen(env.port, () => {
    console.log(`Server running on http://localhost:${env.port}`);
  });

  process.on("SIGINT", () => {
    server.close();
    shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("[DB] shutdown failed:", err);
        process.exit(1);
      });
  });
}

main().catch((err: unknown) => {
  console.error("[ERR] startup failed:", err);
  process.exitCode = 1;
});
