import { z } from "zod";

export const MIN_ITEM_QUANTITY = 1;
export const MAX_ITEM_QUANTITY = 15;

export const DiscountTypeSchema = z.enum(["Percentage", "FixedValue"]);

// amounts are stored as numeric(12, 2)
const MoneySchema = z.number().multipleOf(0.01);

/**
 * Inbound item payload. Quantity bounds are checked on the sent quantity
 * and again on the resulting cart by validateCart.
 */
export const CartItemInputSchema = z.object({
  productId: z.uuid(),
  name: z.string().min(1),
  image: z.string().optional(),
  price: MoneySchema.positive(),
  quantity: z.number().int(),
});

export const CartItemUpdateSchema = CartItemInputSchema.pick({
  productId: true,
  quantity: true,
});

export const VoucherSchema = z
  .object({
    code: z.string().min(1),
    discountType: DiscountTypeSchema,
    percentage: z.number().multipleOf(0.01).min(0).max(100).optional(),
    value: MoneySchema.nonnegative().optional(),
    expirationDate: z.coerce.date(),
    active: z.boolean(),
    firstTimeUseOnly: z.boolean().default(false),
  })
  .refine(
    (voucher) =>
      voucher.discountType === "Percentage"
        ? voucher.percentage !== undefined
        : voucher.value !== undefined,
    "A percentage voucher needs a percentage and a fixed-value voucher needs a value",
  );

export type DiscountType = z.infer<typeof DiscountTypeSchema>;
export type CartItemInput = z.infer<typeof CartItemInputSchema>;
export type CartItemUpdate = z.infer<typeof CartItemUpdateSchema>;
export type Voucher = z.infer<typeof VoucherSchema>;

export type CartItem = {
  id: string;
  shoppingCartId: string;
  productId: string;
  name: string;
  image?: string;
  price: number;
  quantity: number;
};

/**
 * The part of a voucher the cart keeps. Eligibility flags stay with the
 * voucher; the cart only needs enough to recompute its discount.
 */
export type AppliedVoucher = {
  code: string;
  discountType: DiscountType;
  percentage?: number;
  value?: number;
};

export type ShoppingCart = {
  id: string;
  customerId: string;
  items: CartItem[];
  voucher?: AppliedVoucher;
  hasVoucher: boolean;
  amount: number;
  discount: number;
  /** 0 until the cart is first stored. */
  version: number;
};
