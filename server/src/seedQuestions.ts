import { loadEnv } from "./config/env";
import { createPool } from "./config/db";
import { loadSeed } from "./config/seed";

async function main() {
  const env = loadEnv({ ...process.env, TRIVIA_STORE: "postgres" });
  const seed = loadSeed(env.seedFile);
  const pool = createPool(env.databaseUrl ?? "", env.pgSsl);
  const client = await pool.connect();
  try {
    console.log("[SEED] connected to DB");

    await client.query("BEGIN");

    for (const c of seed.categories) {
      await client.query(
        `INSERT INTO categories (id, type) VALUES ($1, $2)
         ON CONFLICT (id) DO UPDATE SET type = EXCLUDED.type`,
        [c.id, c.label]
      );
    }
    // keep the serial ahead of the explicit ids above
    await client.query(
      `SELECT setval(pg_get_serial_sequence('categories', 'id'), COALESCE(MAX(id), 1)) FROM categories`
    );

    // reseeding is safe: same text in the same category is skipped
    for (const q of seed.questions) {
      await client.query(
        `INSERT INTO questions (question, answer, category, difficulty)
         SELECT $1, $2, $3, $4
         WHERE NOT EXISTS (SELECT 1 FROM questions WHERE question = $1 AND category = $3)`,
        [q.question, q.answer, q.category, q.difficulty]
      );
    }

    await client.query("COMMIT");
    console.log(`[SEED] ${seed.categories.length} categories, ${seed.questions.length} questions`);
  } catch (err) {
    await client.query("ROLLBACK");
    console.error("[SEED] failed:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  } finally {
    client.release();
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error("[SEED] failed:", err);
  process.exitCode = 1;
});
