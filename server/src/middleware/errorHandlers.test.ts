import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { errorHandler, messageFor, notFoundHandler, statusOf, zodErrorHandler } from "./errorHandlers";
import { SearchSchema } from "../schemas/triviaSchemas";
import { HttpError } from "../utils/errors";
import { FakeReply } from "../testing/fakeHttp";

describe("error middleware", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers unmatched routes with 404", () => {
    const reply = new FakeReply();
    notFoundHandler({}, reply);
    expect(reply.statusCode).toBe(404);
    expect(reply.body).toEqual({ success: false, error: 404, message: "We couldn't find what you are looking for!" });
  });

  it("turns a ZodError into 400 with the issues", () => {
    const parsed = SearchSchema.safeParse({});
    if (parsed.success) throw new Error("expected failure");
    const reply = new FakeReply();
    const next = vi.fn();

    zodErrorHandler(parsed.error, {}, reply, next);

    expect(next).not.toHaveBeenCalled();
    expect(reply.statusCode).toBe(400);
    expect(reply.body).toEqual({
      success: false,
      error: 400,
      message: "Your request is not well formatted!",
      top: [{ code: "invalid_type", path: "searchTerm", message: "Required" }],
      union: [],
    });
  });

  it("passes other errors on", () => {
    const err = new Error("boom");
    const reply = new FakeReply();
    const next = vi.fn();
    zodErrorHandler(err, {}, reply, next);
    expect(next).toHaveBeenCalledWith(err);
    expect(reply.body).toBeUndefined();
  });

  it("answers a rejected CORS origin with 403", () => {
    const reply = new FakeReply();
    errorHandler(new HttpError(403, "Origin http://evil.test is not allowed by CORS"), {}, reply, vi.fn());
    expect(reply.statusCode).toBe(403);
    expect(reply.body).toEqual({ success: false, error: 403, message: "This origin is not allowed" });
  });

  it("keeps the status of body parser errors", () => {
    const reply = new FakeReply();
    errorHandler(Object.assign(new Error("request entity too large"), { status: 413 }), {}, reply, vi.fn());
    expect(reply.statusCode).toBe(413);
    expect(reply.body).toEqual({ success: false, error: 413, message: "Request body is too large" });
  });

  it("logs and hides unexpected errors", () => {
    const err = new Error("db down");
    const reply = new FakeReply();
    errorHandler(err, {}, reply, vi.fn());
    expect(reply.statusCode).toBe(500);
    expect(reply.body).toEqual({ success: false, error: 500, message: "Internal server error" });
    expect(console.error).toHaveBeenCalledWith("[ERR]", err);
  });

  it("reads status or statusCode and ignores anything outside 4xx/5xx", () => {
    expect(statusOf({ statusCode: 429 })).toBe(429);
    expect(statusOf({ status: 302 })).toBe(500);
    expect(statusOf("nope")).toBe(500);
    expect(messageFor(418)).toBe("Your request could not be handled");
  });
});
