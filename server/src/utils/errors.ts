export type TriviaErrorKind =
  | "InvalidRequest"
  | "ValidationError"
  | "NotFound"
  | "UnprocessableEntity";

export class TriviaError extends Error {
  constructor(
    public readonly kind: TriviaErrorKind,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "TriviaError";
  }
}

export const invalidRequest = (message = "Your request is not well formatted!") =>
  new TriviaError("InvalidRequest", message);

export const validationError = (message: string) =>
  new TriviaError("ValidationError", message);

export const notFound = (message = "We couldn't find what you are looking for!") =>
  new TriviaError("NotFound", message);

export const unprocessable = (cause?: unknown) =>
  new TriviaError(
    "UnprocessableEntity",
    "Sorry, we couldn't process your request",
    cause
  );

const STATUS: Record<TriviaErrorKind, number> = {
  InvalidRequest: 400,
  ValidationError: 422,
  NotFound: 404,
  UnprocessableEntity: 422,
};

export function statusFor(kind: TriviaErrorKind): number {
  return STATUS[kind];
}

/** Wire body for a failed call: { success: false, error: <status>, message } */
export function errorBody(err: TriviaError) {
  return { success: false as const, error: statusFor(err.kind), message: err.message };
}

/** Transport-level failure with a fixed status, e.g. a rejected CORS origin */
export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = "HttpError";
  }
}
