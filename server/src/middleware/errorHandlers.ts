import { ZodError } from "zod";
import { formatZodError } from "../utils/zodError";
import { errorBody, invalidRequest, notFound } from "../utils/errors";
import type { JsonReply } from "../utils/respond";

const MESSAGES: Record<number, string> = {
  400: "Your request is not well formatted!",
  403: "This origin is not allowed",
  404: "We couldn't find what you are looking for!",
  413: "Request body is too large",
  422: "Sorry, we couldn't process your request",
  429: "Too many requests, slow down",
};

export function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const s = "statusCode" in err ? err.statusCode : "status" in err ? err.status : undefined;
    if (typeof s === "number" && s >= 400 && s < 600) return s;
  }
  return 500;
}

export function messageFor(status: number): string {
  if (status >= 500) return "Internal server error";
  return MESSAGES[status] ?? "Your request could not be handled";
}

/** Fallback for routes nothing else matched */
export function notFoundHandler(_req: unknown, res: JsonReply): void {
  res.status(404).json(errorBody(notFound()));
}

// zod handler
export function zodErrorHandler(
  err: unknown,
  _req: unknown,
  res: JsonReply,
  next: (err?: unknown) => void
): void {
  if (err instanceof ZodError) {
    const details = formatZodError(err);
    console.error("[ZOD] validation failed:", JSON.stringify(details, null, 2));
    res.status(400).json({ ...errorBody(invalidRequest()), ...details });
    return;
  }
  next(err);
}

// default error handler
export function errorHandler(
  err: unknown,
  _req: unknown,
  res: JsonReply,
  _next: (err?: unknown) => void
): void {
  const status = statusOf(err);
  if (status >= 500) console.error("[ERR]", err);
  res.status(status).json({ success: false, error: status, message: messageFor(status) });
}
