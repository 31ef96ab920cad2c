import { z } from "zod";

// Missing fields stay undefined/null here; the engine decides what "missing" means.
export const CreateQuestionSchema = z.object({
  question: z.string().nullish(),
  answer: z.string().nullish(),
  category: z.coerce.number().int().nullish(),
  difficulty: z.coerce.number().int().nullish(),
});

export const SearchSchema = z.object({
  searchTerm: z.string(),
});

export const QuizSchema = z.object({
  previous_questions: z.array(z.coerce.number().int()),
  quiz_category: z
    .object({
      id: z.coerce.number().int().nonnegative(),
    })
    .passthrough(),
});

export const PageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
});

export const IdParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const CategoryParamSchema = z.object({
  id: z.coerce.number().int().nonnegative(),
});
