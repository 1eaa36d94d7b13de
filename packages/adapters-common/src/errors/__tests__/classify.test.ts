import {
  NotFoundError,
  PermissionError,
  TransientError,
  ValidationError,
  isRetryable,
} from "../errors";
import { classifyProviderError, extractErrorCodes, isNotFoundError } from "../classify";

function sdkError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields);
}

describe("extractErrorCodes", () => {
  it("should read gRPC codes from gax errors", () => {
    expect(extractErrorCodes(sdkError("not found", { code: 5 }))).toEqual({ grpc: 5 });
  });

  it("should treat three-digit codes as HTTP statuses", () => {
    expect(extractErrorCodes(sdkError("forbidden", { code: 403 }))).toEqual({ http: 403 });
    expect(extractErrorCodes(sdkError("forbidden", { code: "403" }))).toEqual({ http: 403 });
  });

  it("should read gaxios response statuses", () => {
    expect(extractErrorCodes(sdkError("gone", { response: { status: 404 } }))).toEqual({ http: 404 });
  });

  it("should read socket codes", () => {
    expect(extractErrorCodes(sdkError("reset", { code: "ECONNRESET" }))).toEqual({
      socket: "ECONNRESET",
    });
  });

  it("should return nothing for non-objects", () => {
    expect(extractErrorCodes("boom")).toEqual({});
  });
});

describe("classifyProviderError", () => {
  it.each([
    [{ code: 5 }, NotFoundError],
    [{ code: 7 }, PermissionError],
    [{ code: 16 }, PermissionError],
    [{ status: 401 }, PermissionError],
    [{ code: 4 }, TransientError],
    [{ code: 8 }, TransientError],
    [{ code: 14 }, TransientError],
    [{ response: { status: 429 } }, TransientError],
    [{ response: { status: 503 } }, TransientError],
    [{ code: "ETIMEDOUT" }, TransientError],
    [{ code: "EAI_AGAIN" }, TransientError],
    [{ code: 3 }, ValidationError],
    [{ status: 400 }, ValidationError],
  ])("should classify %j", (fields, expected) => {
    expect(classifyProviderError(sdkError("raw", fields), "Failed to read")).toBeInstanceOf(expected);
  });

  it("should prefix the context and keep the cause", () => {
    const raw = sdkError("14 UNAVAILABLE: No connection", { code: 14 });

    const classified = classifyProviderError(raw, "Failed to read secret dev-sql-password");

    if (!(classified instanceof TransientError)) {
      throw new Error("expected a TransientError");
    }
    expect(isRetryable(classified)).toBe(true);
    expect(classified.message).toBe(
      "Failed to read secret dev-sql-password: 14 UNAVAILABLE: No connection"
    );
    expect(classified.cause).toBe(raw);
  });

  it("should return unknown errors unchanged", () => {
    const raw = new TypeError("x is undefined");

    expect(classifyProviderError(raw, "Failed to read")).toBe(raw);
  });

  it("should leave already classified errors alone", () => {
    const error = new NotFoundError("Secret dev-sql-password does not exist");

    expect(classifyProviderError(error, "Failed to read")).toBe(error);
  });
});

describe("isNotFoundError", () => {
  it("should recognise raw and classified not-found errors", () => {
    expect(isNotFoundError(sdkError("missing", { code: 5 }))).toBe(true);
    expect(isNotFoundError(sdkError("missing", { status: 404 }))).toBe(true);
    expect(isNotFoundError(new NotFoundError("missing"))).toBe(true);
    expect(isNotFoundError(sdkError("denied", { code: 7 }))).toBe(false);
  });
});

describe("error taxonomy", () => {
  it("should carry stable codes and names", () => {
    const error = new PermissionError("denied");

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("PermissionError");
    expect(error.code).toBe("PERMISSION_DENIED");
    expect(error.retryable).toBe(false);
  });

  it("should only mark transient errors retryable", () => {
    expect(isRetryable(new TransientError("timeout"))).toBe(true);
    expect(isRetryable(new ValidationError("bad input"))).toBe(false);
    expect(isRetryable(new Error("plain"))).toBe(false);
  });
});
