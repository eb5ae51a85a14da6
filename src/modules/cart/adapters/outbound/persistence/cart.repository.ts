/**
 * Cart Repository Adapter - Implements the outbound repository port
 * This is the persistence adapter using Kysely
 */

import type { Selectable } from "kysely";
import type { DB } from "../../../../../modules/shared/infra/db-schema.js";
import {
  DatabaseError,
  dbQuery,
  type DatabaseExecutor,
} from "../../../../../modules/shared/infra/db.js";
import type { Logger } from "../../../../../modules/shared/infra/logger.js";
import type { CartChange } from "../../../application/cart-change-set.js";
import type { CartRepositoryPort } from "../../../application/ports/outbound/cart-repository.port.js";
import {
  DiscountTypeSchema,
  type CartItem,
  type ShoppingCart,
} from "../../../domain/cart.entity.js";
import { recalculateTotals } from "../../../domain/shopping-cart.js";
import { ConcurrentModificationError } from "../../../errors.js";

type CartRow = Selectable<DB["shopping_carts"]>;
type CartItemRow = Selectable<DB["shopping_cart_items"]>;

export function createCartRepository({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): CartRepositoryPort {
  return {
    async findCart(customerId: string) {
      logger.info({ customerId }, "cart.repository.findCart");
      return await dbQuery(async () => {
        const cart = await db
          .selectFrom("shopping_carts")
          .where("customer_id", "=", customerId)
          .selectAll()
          .executeTakeFirst();
        if (!cart) return undefined;
        const items = await db
          .selectFrom("shopping_cart_items")
          .where("shopping_cart_id", "=", cart.id)
          .orderBy("position")
          .selectAll()
          .execute();
        return mapToEntity(cart, items);
      }, "Failed to load shopping cart");
    },
    async commitAll(changes: readonly CartChange[]) {
      logger.info(
        { changes: changes.map((change) => change.type) },
        "cart.repository.commitAll",
      );
      try {
        return await db.transaction().execute(async (trx) => {
          let affected = 0;
          for (const change of changes) {
            affected += await applyChange(trx, change);
          }
          return affected;
        });
      } catch (error) {
        if (error instanceof ConcurrentModificationError) throw error;
        throw new DatabaseError({
          message: "Failed to commit shopping cart changes",
          cause: error,
        });
      }
    },
  };
}

async function applyChange(
  db: DatabaseExecutor,
  change: CartChange,
): Promise<number> {
  switch (change.type) {
    case "InsertCart": {
      // another request may have created the customer's cart meanwhile
      const result = await db
        .insertInto("shopping_carts")
        .values({
          id: change.cart.id,
          customer_id: change.cart.customerId,
          ...mapToCartColumns(change.cart),
          version: 1,
        })
        .onConflict((oc) => oc.column("customer_id").doNothing())
        .executeTakeFirst();
      const inserted = Number(result.numInsertedOrUpdatedRows ?? 0n);
      if (inserted === 0) throw new ConcurrentModificationError();
      return inserted;
    }
    case "UpdateCart": {
      const result = await db
        .updateTable("shopping_carts")
        .set({
          ...mapToCartColumns(change.cart),
          version: change.expectedVersion + 1,
          updated: new Date(),
        })
        .where("id", "=", change.cart.id)
        .where("version", "=", change.expectedVersion)
        .executeTakeFirst();
      const updated = Number(result.numUpdatedRows);
      if (updated === 0) throw new ConcurrentModificationError();
      return updated;
    }
    case "InsertItem": {
      const result = await db
        .insertInto("shopping_cart_items")
        .values({
          id: change.item.id,
          shopping_cart_id: change.item.shoppingCartId,
          product_id: change.item.productId,
          ...mapToItemColumns(change.item),
        })
        .executeTakeFirst();
      return Number(result.numInsertedOrUpdatedRows ?? 0n);
    }
    case "UpdateItem": {
      const result = await db
        .updateTable("shopping_cart_items")
        .set(mapToItemColumns(change.item))
        .where("id", "=", change.item.id)
        .executeTakeFirst();
      return Number(result.numUpdatedRows);
    }
    case "DeleteItem": {
      const result = await db
        .deleteFrom("shopping_cart_items")
        .where("id", "=", change.item.id)
        .executeTakeFirst();
      return Number(result.numDeletedRows);
    }
  }
}

function mapToCartColumns(cart: ShoppingCart) {
  return {
    amount: cart.amount,
    discount: cart.discount,
    has_voucher: cart.hasVoucher,
    voucher_code: cart.voucher?.code ?? null,
    discount_type: cart.voucher?.discountType ?? null,
    voucher_percentage: cart.voucher?.percentage ?? null,
    voucher_value: cart.voucher?.value ?? null,
  };
}

function mapToItemColumns(item: CartItem) {
  return {
    name: item.name,
    image: item.image ?? null,
    price: item.price,
    quantity: item.quantity,
  };
}

/**
 * Totals are recomputed from the loaded lines and voucher rather than
 * trusted from the stored columns.
 */
export function mapToEntity(
  row: CartRow,
  itemRows: CartItemRow[],
): ShoppingCart {
  const voucher =
    row.has_voucher && row.voucher_code && row.discount_type
      ? {
          code: row.voucher_code,
          discountType: DiscountTypeSchema.parse(row.discount_type),
          percentage: toOptionalNumber(row.voucher_percentage),
          value: toOptionalNumber(row.voucher_value),
        }
      : undefined;
  return recalculateTotals({
    id: row.id,
    customerId: row.customer_id,
    items: itemRows.map((item) => ({
      id: item.id,
      shoppingCartId: item.shopping_cart_id,
      productId: item.product_id,
      name: item.name,
      image: item.image ?? undefined,
      price: Number(item.price),
      quantity: item.quantity,
    })),
    voucher,
    hasVoucher: voucher !== undefined,
    amount: Number(row.amount),
    discount: Number(row.discount),
    version: row.version,
  });
}

function toOptionalNumber(value: string | null): number | undefined {
  return value === null ? undefined : Number(value);
}
