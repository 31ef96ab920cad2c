import type { Result } from "./result";
import { errorBody, statusFor } from "./errors";

/** The part of express's Response the handlers write through */
export interface JsonReply {
  status(code: number): JsonReply;
  json(body: unknown): unknown;
}

/** The part of express's Request the handlers read; zod does the rest */
export type HandlerRequest = {
  query: unknown;
  body: unknown;
  params: unknown;
};

export type Handler = (req: HandlerRequest, res: JsonReply, next: (err?: unknown) => void) => Promise<void>;

export type Presented = {
  status: number;
  body: Record<string, unknown>;
};

/** Turns an engine result into a status + JSON body with a `success` flag */
export function present<T>(
  result: Result<T>,
  shape: (value: T) => Record<string, unknown>,
  status = 200
): Presented {
  if (!result.ok) {
    return { status: statusFor(result.error.kind), body: errorBody(result.error) };
  }
  return { status, body: { success: true, ...shape(result.value) } };
}

export function send<T>(
  res: JsonReply,
  result: Result<T>,
  shape: (value: T) => Record<string, unknown>
): void {
  const { status, body } = present(result, shape);
  res.status(status).json(body);
}
