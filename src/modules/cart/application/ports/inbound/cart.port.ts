/**
 * Inbound Port - Defines what the Cart module offers to the outside world
 * This is the contract that external modules should depend on
 */

import type { CartItem, ShoppingCart } from "../../../domain/cart.entity.js";
import type { CartError } from "../../../errors.js";

/** Built by the identity pre-handler; every use case requires it. */
export type CartRequestContext = {
  customerId: string;
};

export type CartResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: readonly CartError[] };

export interface CartPort {
  /**
   * The customer's cart, or an empty unsaved one when none exists yet
   */
  getCart(context: CartRequestContext): Promise<ShoppingCart>;

  /**
   * Adds an item, creating the cart on the first addition. Succeeds with the
   * stored line, whose quantity includes any merged units.
   */
  addItem(
    context: CartRequestContext,
    input: unknown,
  ): Promise<CartResult<CartItem>>;

  updateItem(
    context: CartRequestContext,
    input: { productId: string; item: unknown },
  ): Promise<CartResult<void>>;

  removeItem(
    context: CartRequestContext,
    input: { productId: string },
  ): Promise<CartResult<void>>;

  applyVoucher(
    context: CartRequestContext,
    input: unknown,
  ): Promise<CartResult<void>>;
}
