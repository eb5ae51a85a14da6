import { CartItemNotFoundError, VoucherIneligibleError } from "../errors.js";
import {
  MAX_ITEM_QUANTITY,
  MIN_ITEM_QUANTITY,
  type AppliedVoucher,
  type CartItem,
  type CartItemInput,
  type ShoppingCart,
  type Voucher,
} from "./cart.entity.js";
import {
  checkVoucherEligibility,
  computeDiscount,
  roundToCents,
  type VoucherEligibilityContext,
} from "./voucher.policy.js";

/**
 * Cart aggregate operations. Every operation returns a new cart value, so a
 * rejected mutation is dropped by simply not keeping its result.
 */

export function createShoppingCart(customerId: string): ShoppingCart {
  return {
    id: crypto.randomUUID(),
    customerId,
    items: [],
    hasVoucher: false,
    amount: 0,
    discount: 0,
    version: 0,
  };
}

export function createCartItem(
  cart: Pick<ShoppingCart, "id">,
  input: CartItemInput,
): CartItem {
  return {
    id: crypto.randomUUID(),
    shoppingCartId: cart.id,
    productId: input.productId,
    name: input.name,
    image: input.image,
    price: input.price,
    quantity: input.quantity,
  };
}

export function recalculateTotals(cart: ShoppingCart): ShoppingCart {
  const amount = roundToCents(
    cart.items.reduce((sum, item) => sum + item.price * item.quantity, 0),
  );
  const discount = cart.voucher ? computeDiscount(amount, cart.voucher) : 0;
  return {
    ...cart,
    amount,
    discount,
    hasVoucher: cart.voucher !== undefined,
  };
}

export function hasItem(
  cart: ShoppingCart,
  candidate: Pick<CartItem, "productId">,
): boolean {
  return cart.items.some((item) => item.productId === candidate.productId);
}

export function getProductById(
  cart: ShoppingCart,
  productId: string,
): CartItem | undefined {
  return cart.items.find((item) => item.productId === productId);
}

/**
 * Inserts the item, or adds its quantity to the line already holding the
 * product. The merged line keeps its stored identity.
 */
export function addItem(cart: ShoppingCart, item: CartItem): ShoppingCart {
  const items = hasItem(cart, item)
    ? cart.items.map((current) =>
        current.productId === item.productId
          ? { ...current, quantity: current.quantity + item.quantity }
          : current,
      )
    : [...cart.items, { ...item, shoppingCartId: cart.id }];
  return recalculateTotals({ ...cart, items });
}

export function updateUnit(
  cart: ShoppingCart,
  item: Pick<CartItem, "productId">,
  quantity: number,
): ShoppingCart {
  assertHasItem(cart, item);
  const items = cart.items.map((current) =>
    current.productId === item.productId ? { ...current, quantity } : current,
  );
  return recalculateTotals({ ...cart, items });
}

export function removeItem(
  cart: ShoppingCart,
  item: Pick<CartItem, "productId">,
): ShoppingCart {
  assertHasItem(cart, item);
  const items = cart.items.filter(
    (current) => current.productId !== item.productId,
  );
  return recalculateTotals({ ...cart, items });
}

export type VoucherApplication =
  | { applied: true; cart: ShoppingCart }
  | { applied: false; error: VoucherIneligibleError };

export function applyVoucher(
  cart: ShoppingCart,
  voucher: Voucher,
  context: VoucherEligibilityContext,
): VoucherApplication {
  const eligibility = checkVoucherEligibility(voucher, context);
  if (!eligibility.eligible) {
    return {
      applied: false,
      error: new VoucherIneligibleError(eligibility.reason),
    };
  }
  const applied: AppliedVoucher = {
    code: voucher.code,
    discountType: voucher.discountType,
    percentage: voucher.percentage,
    value: voucher.value,
  };
  return { applied: true, cart: recalculateTotals({ ...cart, voucher: applied }) };
}

export type CartValidationResult = {
  isValid: boolean;
  errors: string[];
};

type CartRule = (cart: ShoppingCart) => string[];

const cartRules: CartRule[] = [
  (cart) => (cart.customerId ? [] : ["Customer not recognized"]),
  (cart) => cart.items.flatMap(checkItemQuantity),
  (cart) =>
    new Set(cart.items.map((item) => item.productId)).size === cart.items.length
      ? []
      : ["A product can only appear once in the cart"],
  (cart) =>
    cart.amount >= cart.discount
      ? []
      : ["The discount cannot exceed the cart amount"],
];

/**
 * Applies to a sent quantity as well as to a line after merging.
 */
export function checkItemQuantity(
  item: Pick<CartItem, "name" | "quantity">,
): string[] {
  if (item.quantity < MIN_ITEM_QUANTITY) {
    return [`The minimum quantity of ${item.name} is ${MIN_ITEM_QUANTITY}`];
  }
  if (item.quantity > MAX_ITEM_QUANTITY) {
    return [`The maximum quantity of ${item.name} is ${MAX_ITEM_QUANTITY}`];
  }
  return [];
}

/**
 * Runs every rule; an empty cart is valid.
 */
export function validateCart(cart: ShoppingCart): CartValidationResult {
  const errors = cartRules.flatMap((rule) => rule(cart));
  return { isValid: errors.length === 0, errors };
}

function assertHasItem(
  cart: ShoppingCart,
  item: Pick<CartItem, "productId">,
): void {
  if (!hasItem(cart, item)) throw new CartItemNotFoundError();
}
