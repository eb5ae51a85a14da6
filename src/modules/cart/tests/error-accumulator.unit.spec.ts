import { describe, expect, it } from "vitest";
import { createErrorAccumulator } from "../application/error-accumulator.js";
import { CartNotFoundError, PersistenceFailureError } from "../errors.js";

describe("Error Accumulator", () => {
  it("should start empty", () => {
    const errors = createErrorAccumulator();

    expect(errors.hasErrors()).toBe(false);
    expect(errors.errors()).toEqual([]);
  });

  it("should keep errors in the order they were added", () => {
    const errors = createErrorAccumulator();

    errors.add(new CartNotFoundError());
    errors.addValidationMessages(["first rule", "second rule"]);
    errors.add(new PersistenceFailureError());

    expect(errors.hasErrors()).toBe(true);
    expect(
      errors.errors().map(({ kind, message }) => ({ kind, message })),
    ).toEqual([
      { kind: "NotFoundError", message: "Shopping cart not found" },
      { kind: "ValidationError", message: "first rule" },
      { kind: "ValidationError", message: "second rule" },
      { kind: "PersistenceFailure", message: "Error saving data" },
    ]);
  });

  it("should not share state between accumulators", () => {
    const first = createErrorAccumulator();
    const second = createErrorAccumulator();

    first.add(new CartNotFoundError());

    expect(second.hasErrors()).toBe(false);
  });

  it("should hand out copies of its errors", () => {
    const errors = createErrorAccumulator();
    errors.add(new CartNotFoundError());

    const snapshot = errors.errors();
    errors.add(new PersistenceFailureError());

    expect(snapshot).toHaveLength(1);
  });
});
