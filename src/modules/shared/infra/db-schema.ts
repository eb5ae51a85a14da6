import type { ColumnType, Generated } from "kysely";

// numeric columns come back from pg as strings
type Numeric = ColumnType<string, number | string, number | string>;
type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export interface ShoppingCartsTable {
  id: string;
  customer_id: string;
  amount: Numeric;
  discount: Numeric;
  has_voucher: boolean;
  voucher_code: string | null;
  discount_type: string | null;
  voucher_percentage: Numeric | null;
  voucher_value: Numeric | null;
  version: number;
  created: Timestamp;
  updated: Timestamp;
}

export interface ShoppingCartItemsTable {
  id: string;
  shopping_cart_id: string;
  product_id: string;
  name: string;
  image: string | null;
  price: Numeric;
  quantity: number;
  position: Generated<number>;
}

export interface DB {
  shopping_carts: ShoppingCartsTable;
  shopping_cart_items: ShoppingCartItemsTable;
}
