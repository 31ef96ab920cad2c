import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(5000),
    TRIVIA_STORE: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: z.string().optional(),
    PGSSL: z.string().optional(),
    SEED_FILE: z.string().default("server/db/seed.json"),
    QUESTIONS_PER_PAGE: z.coerce.number().int().positive().default(10),
    CORS_ORIGIN: z.string().default(""),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  })
  .refine((e) => e.TRIVIA_STORE !== "postgres" || !!e.DATABASE_URL, {
    path: ["DATABASE_URL"],
    message: "DATABASE_URL is required when TRIVIA_STORE=postgres",
  });

export type Env = {
  port: number;
  store: "postgres" | "memory";
  databaseUrl?: string;
  pgSsl: boolean;
  seedFile: string;
  pageSize: number;
  corsOrigins: string[];
  rateLimitMax: number;
};

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const e = EnvSchema.parse(source);
  return {
    port: e.PORT,
    store: e.TRIVIA_STORE,
    databaseUrl: e.DATABASE_URL,
    pgSsl: e.PGSSL === "true",
    seedFile: e.SEED_FILE,
    pageSize: e.QUESTIONS_PER_PAGE,
    // CORS: allow comma-separated origins in CORS_ORIGIN
    corsOrigins: e.CORS_ORIGIN.split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    rateLimitMax: e.RATE_LIMIT_MAX,
  };
}
