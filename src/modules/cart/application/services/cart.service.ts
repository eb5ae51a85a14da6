/**
 * Cart Application Service - Implements the inbound port (use cases)
 * Every mutation runs resolve → bind → mutate → validate → persist → respond,
 * with a fresh error accumulator per call. Nothing is written unless the
 * accumulator is still empty after validation.
 */

import type { z } from "zod";
import {
  CartItemInputSchema,
  CartItemUpdateSchema,
  VoucherSchema,
  type CartItem,
  type ShoppingCart,
} from "../../domain/cart.entity.js";
import {
  addItem,
  applyVoucher,
  checkItemQuantity,
  createCartItem,
  createShoppingCart,
  getProductById,
  hasItem,
  removeItem,
  updateUnit,
  validateCart,
} from "../../domain/shopping-cart.js";
import {
  CartItemNotFoundError,
  type CartError,
  CartNotFoundError,
  ConcurrentModificationError,
  ItemIdentityMismatchError,
  PersistenceFailureError,
} from "../../errors.js";
import { createCartChangeSet, type CartChangeSet } from "../cart-change-set.js";
import {
  createErrorAccumulator,
  type ErrorAccumulator,
} from "../error-accumulator.js";
import type {
  CartPort,
  CartRequestContext,
  CartResult,
} from "../ports/inbound/cart.port.js";
import type { CartRepositoryPort } from "../ports/outbound/cart-repository.port.js";
import type { VoucherUsageServicePort } from "../ports/outbound/voucher-usage-service.port.js";

type Dependencies = {
  repository: CartRepositoryPort;
  voucherUsageService: VoucherUsageServicePort;
  now: () => Date;
};

export function createCartService({
  repository,
  voucherUsageService,
  now = () => new Date(),
}: Omit<Dependencies, "now"> & { now?: () => Date }): CartPort {
  const deps: Dependencies = { repository, voucherUsageService, now };
  return {
    getCart: createGetCartUseCase(deps),
    addItem: createAddItemUseCase(deps),
    updateItem: createUpdateItemUseCase(deps),
    removeItem: createRemoveItemUseCase(deps),
    applyVoucher: createApplyVoucherUseCase(deps),
  };
}

function createGetCartUseCase({ repository }: Pick<Dependencies, "repository">) {
  return async ({ customerId }: CartRequestContext) => {
    const cart = await repository.findCart(customerId);
    return cart ?? createShoppingCart(customerId);
  };
}

/**
 * The sent quantity must be within bounds on its own; the merged line is
 * checked again by validateCart. A missing cart is created in memory.
 * Whether the product is already in the cart only decides which item
 * command is issued on commit.
 */
function createAddItemUseCase({ repository }: Pick<Dependencies, "repository">) {
  return async (
    { customerId }: CartRequestContext,
    input: unknown,
  ): Promise<CartResult<CartItem>> => {
    const errors = createErrorAccumulator();
    const parsed = bind(CartItemInputSchema, input, errors);
    if (!parsed) return failure(errors);
    errors.addValidationMessages(checkItemQuantity(parsed));
    if (errors.hasErrors()) return failure(errors);

    const cart =
      (await repository.findCart(customerId)) ?? createShoppingCart(customerId);
    const isNewItem = !hasItem(cart, parsed);
    const item = createCartItem(cart, parsed);
    const mutated = addItem(cart, item);

    validate(mutated, errors);
    if (errors.hasErrors()) return failure(errors);

    const stored = getProductById(mutated, item.productId) ?? item;
    const changes = createCartChangeSet();
    changes.upsertCart(mutated);
    changes.upsertItem(stored, { isNew: isNewItem });

    await persist(repository, changes, errors);
    if (errors.hasErrors()) return failure(errors);
    return { ok: true, value: stored };
  };
}

function createUpdateItemUseCase({
  repository,
}: Pick<Dependencies, "repository">) {
  return async (
    { customerId }: CartRequestContext,
    input: { productId: string; item: unknown },
  ): Promise<CartResult<void>> => {
    const errors = createErrorAccumulator();
    const parsed = bind(CartItemUpdateSchema, input.item, errors);
    if (!parsed) return failure(errors);
    if (parsed.productId !== input.productId) {
      errors.add(new ItemIdentityMismatchError());
      return failure(errors);
    }

    const cart = await repository.findCart(customerId);
    const target = bindTarget(cart, input.productId, errors);
    if (!target) return failure(errors);

    const mutated = updateUnit(target.cart, target.item, parsed.quantity);
    validate(mutated, errors);
    if (errors.hasErrors()) return failure(errors);

    const changes = createCartChangeSet();
    changes.upsertCart(mutated);
    changes.upsertItem(getProductById(mutated, input.productId) ?? target.item, {
      isNew: false,
    });

    await persist(repository, changes, errors);
    return errors.hasErrors() ? failure(errors) : success();
  };
}

function createRemoveItemUseCase({
  repository,
}: Pick<Dependencies, "repository">) {
  return async (
    { customerId }: CartRequestContext,
    { productId }: { productId: string },
  ): Promise<CartResult<void>> => {
    const errors = createErrorAccumulator();
    const cart = await repository.findCart(customerId);
    const target = bindTarget(cart, productId, errors);
    if (!target) return failure(errors);

    const mutated = removeItem(target.cart, target.item);
    validate(mutated, errors);
    if (errors.hasErrors()) return failure(errors);

    const changes = createCartChangeSet();
    changes.upsertCart(mutated);
    changes.deleteItem(target.item);

    await persist(repository, changes, errors);
    return errors.hasErrors() ? failure(errors) : success();
  };
}

function createApplyVoucherUseCase({
  repository,
  voucherUsageService,
  now,
}: Dependencies) {
  return async (
    { customerId }: CartRequestContext,
    input: unknown,
  ): Promise<CartResult<void>> => {
    const errors = createErrorAccumulator();
    const voucher = bind(VoucherSchema, input, errors);
    if (!voucher) return failure(errors);

    const cart = await repository.findCart(customerId);
    if (!cart) {
      errors.add(new CartNotFoundError());
      return failure(errors);
    }

    const firstTimeUseConsumed = voucher.firstTimeUseOnly
      ? await voucherUsageService.hasUsedVoucher({
          customerId,
          code: voucher.code,
        })
      : false;
    const application = applyVoucher(cart, voucher, {
      now: now(),
      firstTimeUseConsumed,
    });
    if (!application.applied) {
      errors.add(application.error);
      return failure(errors);
    }

    validate(application.cart, errors);
    if (errors.hasErrors()) return failure(errors);

    const changes = createCartChangeSet();
    changes.upsertCart(application.cart);

    await persist(repository, changes, errors);
    return errors.hasErrors() ? failure(errors) : success();
  };
}

function bind<S extends z.ZodType>(
  schema: S,
  input: unknown,
  errors: ErrorAccumulator,
): z.output<S> | undefined {
  const result = schema.safeParse(input);
  if (result.success) return result.data;
  errors.addValidationMessages(
    result.error.issues.map((issue) =>
      issue.path.length > 0
        ? `${issue.path.map(String).join(".")}: ${issue.message}`
        : issue.message,
    ),
  );
  return undefined;
}

function bindTarget(
  cart: ShoppingCart | undefined,
  productId: string,
  errors: ErrorAccumulator,
): { cart: ShoppingCart; item: CartItem } | undefined {
  if (!cart) {
    errors.add(new CartNotFoundError());
    return undefined;
  }
  const item = getProductById(cart, productId);
  if (!item) {
    errors.add(new CartItemNotFoundError());
    return undefined;
  }
  return { cart, item };
}

function validate(cart: ShoppingCart, errors: ErrorAccumulator): void {
  const result = validateCart(cart);
  if (!result.isValid) errors.addValidationMessages(result.errors);
}

/**
 * A commit that touches no row is reported, not retried. A version
 * conflict means another request won the race; the caller resubmits.
 */
async function persist(
  repository: CartRepositoryPort,
  changes: CartChangeSet,
  errors: ErrorAccumulator,
): Promise<void> {
  try {
    const affected = await repository.commitAll(changes.changes());
    if (affected <= 0) errors.add(new PersistenceFailureError());
  } catch (error) {
    if (!(error instanceof ConcurrentModificationError)) throw error;
    errors.add(error);
  }
}

function success(): CartResult<void> {
  return { ok: true, value: undefined };
}

function failure(errors: ErrorAccumulator): {
  ok: false;
  errors: readonly CartError[];
} {
  return { ok: false, errors: errors.errors() };
}
