// server/src/utils/zodError.ts
import type { ZodError, ZodIssue } from "zod";

function simplify(i: ZodIssue) {
  return {
    code: i.code,
    path: i.path.join("."),
    message: i.message,
  };
}

export function formatZodError(err: ZodError) {
  // Flatten union branch errors so you can see which branch failed on what
  const union = err.issues.flatMap((i) =>
    i.code === "invalid_union"
      ? i.unionErrors.flatMap((e) => e.issues.map((u) => ({ ...simplify(u), _union: true })))
      : []
  );

  return { top: err.issues.map(simplify), union };
}
