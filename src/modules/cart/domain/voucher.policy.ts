import type { AppliedVoucher, Voucher } from "./cart.entity.js";

export type VoucherEligibilityContext = {
  now: Date;
  /** Supplied by the voucher usage service; this module keeps no usage record. */
  firstTimeUseConsumed: boolean;
};

export type VoucherEligibility =
  | { eligible: true }
  | { eligible: false; reason: string };

export function checkVoucherEligibility(
  voucher: Voucher,
  { now, firstTimeUseConsumed }: VoucherEligibilityContext,
): VoucherEligibility {
  if (!voucher.active) {
    return { eligible: false, reason: `Voucher ${voucher.code} is not active` };
  }
  if (voucher.expirationDate.getTime() < now.getTime()) {
    return { eligible: false, reason: `Voucher ${voucher.code} has expired` };
  }
  if (voucher.firstTimeUseOnly && firstTimeUseConsumed) {
    return {
      eligible: false,
      reason: `Voucher ${voucher.code} can only be used on a first purchase`,
    };
  }
  return { eligible: true };
}

/**
 * Percentage vouchers take a share of the amount; fixed-value vouchers are
 * capped at the amount so the total after discount never goes negative.
 */
export function computeDiscount(
  amount: number,
  voucher: AppliedVoucher,
): number {
  const discount =
    voucher.discountType === "Percentage"
      ? amount * ((voucher.percentage ?? 0) / 100)
      : Math.min(voucher.value ?? 0, amount);
  return roundToCents(discount);
}

export function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}
