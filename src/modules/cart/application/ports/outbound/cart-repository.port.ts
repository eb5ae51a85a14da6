/**
 * Outbound Port - Defines what the Cart module needs from persistence
 * This interface must be implemented by the persistence adapter
 */

import type { ShoppingCart } from "../../../domain/cart.entity.js";
import type { CartChange } from "../../cart-change-set.js";

export interface CartRepositoryPort {
  /** The customer's cart with its items, in insertion order. */
  findCart(customerId: string): Promise<ShoppingCart | undefined>;

  /**
   * Applies every change in one transaction and returns the number of rows
   * affected.
   * @throws ConcurrentModificationError if the cart changed since it was read
   */
  commitAll(changes: readonly CartChange[]): Promise<number>;
}
