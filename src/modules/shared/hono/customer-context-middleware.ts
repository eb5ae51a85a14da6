import type { Context } from "hono";
import { AsyncLocalStorage } from "node:async_hooks";
import crypto from "node:crypto";
import { z } from "zod";

export interface AppContext {
  requestId: string;
  customerId: string;
}

export type CustomerIdResolver = (c: Context) => string | undefined;

const als = new AsyncLocalStorage<AppContext>();

export const CUSTOMER_ID_HEADER = "x-customer-id";

/**
 * The API gateway verifies the caller's token and forwards the customer id
 * in a header. Anything that is not a UUID is treated as anonymous.
 */
export const customerIdFromHeader: CustomerIdResolver = (c) => {
  const parsed = z.uuid().safeParse(c.req.header(CUSTOMER_ID_HEADER));
  return parsed.success ? parsed.data : undefined;
};

/**
 * Resolves the customer before any route handler runs and stores the request
 * context in the AsyncLocalStorage. Requests without a customer get a 401.
 */
export function createCustomerContextMiddleware(
  resolveCustomerId: CustomerIdResolver = customerIdFromHeader,
) {
  return async (c: Context, next: () => Promise<void>) => {
    const customerId = resolveCustomerId(c);
    if (!customerId) {
      return c.json({ message: "Customer not authenticated" }, 401);
    }
    const appContext = {
      requestId: crypto.randomUUID(),
      customerId,
    };
    await als.run(appContext, () => next());
  };
}

export function getContext(): AppContext {
  const context = als.getStore();
  if (!context) {
    throw new Error("No customer context: is the middleware mounted?");
  }
  return context;
}
