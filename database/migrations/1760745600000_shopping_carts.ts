import { sql, type Kysely } from "kysely";

// `unknown` keeps the migration independent of the current schema types; migrations should be frozen in time.
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("shopping_carts")
    .ifNotExists()
    .addColumn("id", "text", (col) => col.notNull()) // uuid
    .addColumn("customer_id", "text", (col) => col.notNull())
    .addColumn("amount", "numeric(12, 2)", (col) => col.notNull().defaultTo(0))
    .addColumn("discount", "numeric(12, 2)", (col) =>
      col.notNull().defaultTo(0),
    )
    .addColumn("has_voucher", "boolean", (col) =>
      col.notNull().defaultTo(false),
    )
    // Value copy of the applied voucher
    .addColumn("voucher_code", "text")
    .addColumn("discount_type", "text")
    .addColumn("voucher_percentage", "numeric(5, 2)")
    .addColumn("voucher_value", "numeric(12, 2)")
    // Optimistic concurrency token
    .addColumn("version", "integer", (col) => col.notNull().defaultTo(1))
    .addColumn("created", "timestamptz(3)", (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .addColumn("updated", "timestamptz(3)", (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .addPrimaryKeyConstraint("pk_shopping_carts", ["id"])
    .execute();

  await db.schema
    .createIndex("uq_shopping_carts_customer")
    .on("shopping_carts")
    .column("customer_id")
    .unique()
    .execute();

  await db.schema
    .createTable("shopping_cart_items")
    .ifNotExists()
    .addColumn("id", "text", (col) => col.notNull()) // uuid
    .addColumn("shopping_cart_id", "text", (col) =>
      col.notNull().references("shopping_carts.id").onDelete("cascade"),
    )
    .addColumn("product_id", "text", (col) => col.notNull())
    .addColumn("name", "text", (col) => col.notNull())
    .addColumn("image", "text")
    .addColumn("price", "numeric(12, 2)", (col) => col.notNull())
    .addColumn("quantity", "integer", (col) => col.notNull())
    .addColumn("position", "serial", (col) => col.notNull())
    .addPrimaryKeyConstraint("pk_shopping_cart_items", ["id"])
    .addUniqueConstraint("uq_shopping_cart_items_product", [
      "shopping_cart_id",
      "product_id",
    ])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("shopping_cart_items").ifExists().execute();
  await db.schema.dropIndex("uq_shopping_carts_customer").ifExists().execute();
  await db.schema.dropTable("shopping_carts").ifExists().execute();
}
