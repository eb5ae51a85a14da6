/**
 * Voucher Usage Service Adapter - Implements the Cart module's voucher usage port
 */

import type { Logger } from "../../../../../modules/shared/infra/logger.js";
import type { VoucherUsageServicePort } from "../../../application/ports/outbound/voucher-usage-service.port.js";

/**
 * Adapter for deployments where no service records voucher redemptions yet.
 * Every voucher counts as unused, so first-time-use vouchers are accepted.
 */
export function createUnrecordedVoucherUsageAdapter({
  logger,
}: {
  logger: Logger;
}): VoucherUsageServicePort {
  return {
    hasUsedVoucher: async ({ customerId, code }) => {
      logger.debug(
        { customerId, code },
        "voucher-usage.hasUsedVoucher: no usage record available",
      );
      return false;
    },
  };
}
