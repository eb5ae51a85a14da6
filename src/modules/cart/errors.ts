/**
 * Each module has one errors.ts file. All errors in the module are exported from here.
 *
 * Business errors are collected as values by the request's error accumulator.
 * They are thrown only by aggregate preconditions (an item the cart does not
 * hold) and by the repository on a version conflict, to roll back the commit.
 */

export type CartErrorKind =
  | "ValidationError"
  | "IdentityMismatchError"
  | "NotFoundError"
  | "VoucherIneligibleError"
  | "PersistenceFailure"
  | "ConcurrentModificationError";

export class CartError extends Error {
  constructor(
    readonly kind: CartErrorKind,
    message: string,
  ) {
    super(message);
    this.name = kind;
  }
}

export class CartValidationError extends CartError {
  constructor(message: string) {
    super("ValidationError", message);
  }
}

export class ItemIdentityMismatchError extends CartError {
  constructor() {
    super("IdentityMismatchError", "Current item is not the same sent item");
  }
}

export class CartNotFoundError extends CartError {
  constructor() {
    super("NotFoundError", "Shopping cart not found");
  }
}

export class CartItemNotFoundError extends CartError {
  constructor() {
    super("NotFoundError", "The item is not in cart");
  }
}

export class VoucherIneligibleError extends CartError {
  constructor(message: string) {
    super("VoucherIneligibleError", message);
  }
}

export class PersistenceFailureError extends CartError {
  constructor() {
    super("PersistenceFailure", "Error saving data");
  }
}

export class ConcurrentModificationError extends CartError {
  constructor() {
    super(
      "ConcurrentModificationError",
      "The shopping cart was modified by another request",
    );
  }
}
