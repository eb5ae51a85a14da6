/**
 * Cart Module - Composition root
 * Wires together all the dependencies following hexagonal architecture
 */

import type { CustomerIdResolver } from "../shared/hono/customer-context-middleware.js";
import type { DatabaseExecutor } from "../shared/infra/db.js";
import type { Logger } from "../shared/infra/logger.js";
import { createCartController } from "./adapters/inbound/http/cart.controller.js";
import { createCartRepository } from "./adapters/outbound/persistence/cart.repository.js";
import { createUnrecordedVoucherUsageAdapter } from "./adapters/outbound/services/voucher-usage-service.adapter.js";
import type { CartPort } from "./application/ports/inbound/cart.port.js";
import type { VoucherUsageServicePort } from "./application/ports/outbound/voucher-usage-service.port.js";
import { createCartService } from "./application/services/cart.service.js";

/**
 * Creates the Cart Port (application service)
 * This is what other modules should depend on
 */
export function createCartModule({
  db,
  logger,
  voucherUsageService = createUnrecordedVoucherUsageAdapter({ logger }),
}: {
  db: DatabaseExecutor;
  logger: Logger;
  voucherUsageService?: VoucherUsageServicePort;
}): CartPort {
  const repository = createCartRepository({ db, logger });
  return createCartService({ repository, voucherUsageService });
}

/**
 * Creates the Cart HTTP Controller
 * This is for HTTP routing and should be mounted in the main app
 */
export function createCartHttpAdapter({
  cartPort,
  logger,
  resolveCustomerId,
}: {
  cartPort: CartPort;
  logger: Logger;
  resolveCustomerId?: CustomerIdResolver;
}) {
  return createCartController({ cartPort, logger, resolveCustomerId });
}

// Re-export the port interface for other modules to use
export type {
  CartPort,
  CartRequestContext,
  CartResult,
} from "./application/ports/inbound/cart.port.js";
