import { describe, expect, it } from "vitest";
import { EmbeddingError, RetrievalError, ValidationError, describeError } from "./errors.js";

describe("errors", () => {
  it("carries a code and an HTTP status", () => {
    const err = new ValidationError("No message provided");
    expect(err.name).toBe("ValidationError");
    expect(err.code).toBe("VALIDATION_ERROR");
    expect(err.status).toBe(400);
    expect(new EmbeddingError("x").status).toBe(500);
  });

  it("describes the cause chain", () => {
    const err = new RetrievalError("Vector store query failed", { cause: new Error("ECONNRESET") });
    expect(describeError(err)).toBe("RetrievalError: Vector store query failed <- Error: ECONNRESET");
    expect(describeError("plain")).toBe("plain");
  });
});
