import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import type { MemorySeed } from "../repositories/memoryQuestionRepository";

const SeedSchema = z.object({
  categories: z.array(z.object({ id: z.number().int().positive(), label: z.string().min(1) })),
  questions: z.array(
    z.object({
      question: z.string().min(1),
      answer: z.string().min(1),
      category: z.number().int().positive(),
      difficulty: z.number().int().min(1).max(5),
    })
  ),
});

/** Reads a seed file relative to the working directory */
export function loadSeed(file: string): MemorySeed {
  const raw = readFileSync(path.resolve(process.cwd(), file), "utf8");
  return SeedSchema.parse(JSON.parse(raw));
}
