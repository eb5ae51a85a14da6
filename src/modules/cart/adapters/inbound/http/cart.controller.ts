/**
 * Cart HTTP Controller - Inbound adapter for HTTP requests
 * Translates HTTP requests to use case calls
 */

import { Hono, type Context } from "hono";
import {
  createCustomerContextMiddleware,
  getContext,
  type CustomerIdResolver,
} from "../../../../../modules/shared/hono/customer-context-middleware.js";
import type { Logger } from "../../../../../modules/shared/infra/logger.js";
import type { CartPort } from "../../../application/ports/inbound/cart.port.js";
import type { CartError } from "../../../errors.js";

export function createCartController({
  cartPort,
  logger,
  resolveCustomerId,
}: {
  cartPort: CartPort;
  logger: Logger;
  resolveCustomerId?: CustomerIdResolver;
}) {
  const app = new Hono();
  app.use("/shopping-cart/*", createCustomerContextMiddleware(resolveCustomerId));

  app.get("/shopping-cart", async (c) => {
    const { customerId } = getContext();
    const cart = await cartPort.getCart({ customerId });
    return c.json(cart);
  });

  app.post("/shopping-cart", async (c) => {
    const { customerId } = getContext();
    const body = await readJson(c);
    const result = await cartPort.addItem({ customerId }, body);
    if (!result.ok) return problem(c, result.errors, logger, "addItem");
    return c.json(result.value, 201);
  });

  app.post("/shopping-cart/apply-voucher", async (c) => {
    const { customerId } = getContext();
    const body = await readJson(c);
    const result = await cartPort.applyVoucher({ customerId }, body);
    if (!result.ok) return problem(c, result.errors, logger, "applyVoucher");
    return c.body(null, 204);
  });

  app.put("/shopping-cart/:productId", async (c) => {
    const { customerId } = getContext();
    const productId = c.req.param("productId");
    const body = await readJson(c);
    const result = await cartPort.updateItem(
      { customerId },
      { productId, item: body },
    );
    if (!result.ok) return problem(c, result.errors, logger, "updateItem");
    return c.body(null, 204);
  });

  app.delete("/shopping-cart/:productId", async (c) => {
    const { customerId } = getContext();
    const productId = c.req.param("productId");
    const result = await cartPort.removeItem({ customerId }, { productId });
    if (!result.ok) return problem(c, result.errors, logger, "removeItem");
    return c.body(null, 204);
  });

  app.onError((error, c) => {
    logger.error({ error }, "shoppingCart");
    return c.json({ message: "Failed to process shopping cart request" }, 500);
  });

  return app;
}

// an unreadable body binds as nothing and fails validation downstream
async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    return undefined;
  }
}

const problemTitles = {
  400: "One or more validation errors occurred.",
  404: "The requested shopping cart or item was not found.",
  409: "The shopping cart was changed by another request.",
} as const;

function problem(
  c: Context,
  errors: readonly CartError[],
  logger: Logger,
  operation: string,
) {
  const status = toStatus(errors);
  const messages = errors.map((error) => error.message);
  const { requestId } = getContext();
  logger.info({ requestId, messages }, `${operation} rejected`);
  return c.json(
    {
      title: problemTitles[status],
      status,
      errors: { Messages: messages },
    },
    status,
  );
}

function toStatus(errors: readonly CartError[]): 400 | 404 | 409 {
  if (errors.some((error) => error.kind === "ConcurrentModificationError")) {
    return 409;
  }
  if (
    errors.length > 0 &&
    errors.every((error) => error.kind === "NotFoundError")
  ) {
    return 404;
  }
  return 400;
}
