import { describe, expect, it } from "vitest";
import { createCartChangeSet } from "../application/cart-change-set.js";
import { createCartItem, createShoppingCart } from "../domain/shopping-cart.js";
import { CUSTOMER_ID, generateItem } from "./test-utils.js";

describe("Cart Change Set", () => {
  it("should insert a cart that was never stored and update a stored one", () => {
    const fresh = createShoppingCart(CUSTOMER_ID);
    const stored = { ...createShoppingCart(CUSTOMER_ID), version: 3 };
    const changes = createCartChangeSet();

    changes.upsertCart(fresh);
    changes.upsertCart(stored);

    expect(changes.changes()).toEqual([
      { type: "InsertCart", cart: fresh },
      { type: "UpdateCart", cart: stored, expectedVersion: 3 },
    ]);
  });

  it("should follow the caller's choice between inserting and updating an item", () => {
    const cart = createShoppingCart(CUSTOMER_ID);
    const item = createCartItem(cart, generateItem());
    const changes = createCartChangeSet();

    changes.upsertItem(item, { isNew: true });
    changes.upsertItem(item, { isNew: false });
    changes.deleteItem(item);

    expect(changes.changes().map((change) => change.type)).toEqual([
      "InsertItem",
      "UpdateItem",
      "DeleteItem",
    ]);
  });

  it("should hand out a copy of the collected changes", () => {
    const changes = createCartChangeSet();
    const snapshot = changes.changes();

    changes.upsertCart(createShoppingCart(CUSTOMER_ID));

    expect(snapshot).toEqual([]);
  });
});
