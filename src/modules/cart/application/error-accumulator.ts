import { CartError, CartValidationError } from "../errors.js";

/**
 * Collects the business errors of one request. Create one per use case call
 * and pass it along; it must never outlive the request.
 */
export function createErrorAccumulator() {
  const errors: CartError[] = [];

  return {
    add(error: CartError) {
      errors.push(error);
    },
    addValidationMessages(messages: readonly string[]) {
      for (const message of messages) {
        errors.push(new CartValidationError(message));
      }
    },
    hasErrors() {
      return errors.length > 0;
    },
    errors(): readonly CartError[] {
      return [...errors];
    },
  };
}

export type ErrorAccumulator = ReturnType<typeof createErrorAccumulator>;
