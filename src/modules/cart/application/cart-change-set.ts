import type { CartItem, ShoppingCart } from "../domain/cart.entity.js";

/**
 * Entity-level write commands. The use case chooses insert or update from
 * what it learned while mutating; the repository never infers it.
 */
export type CartChange =
  | { type: "InsertCart"; cart: ShoppingCart }
  | { type: "UpdateCart"; cart: ShoppingCart; expectedVersion: number }
  | { type: "InsertItem"; item: CartItem }
  | { type: "UpdateItem"; item: CartItem }
  | { type: "DeleteItem"; item: CartItem };

export function createCartChangeSet() {
  const changes: CartChange[] = [];

  return {
    /**
     * A cart with version 0 has never been stored. Otherwise the update is
     * conditional on the version read when the request resolved the cart.
     */
    upsertCart(cart: ShoppingCart) {
      changes.push(
        cart.version === 0
          ? { type: "InsertCart", cart }
          : { type: "UpdateCart", cart, expectedVersion: cart.version },
      );
    },
    upsertItem(item: CartItem, { isNew }: { isNew: boolean }) {
      changes.push(
        isNew ? { type: "InsertItem", item } : { type: "UpdateItem", item },
      );
    },
    deleteItem(item: CartItem) {
      changes.push({ type: "DeleteItem", item });
    },
    changes(): readonly CartChange[] {
      return [...changes];
    },
  };
}

export type CartChangeSet = ReturnType<typeof createCartChangeSet>;
