/**
 * Outbound Port - Defines what the Cart module needs to know about past voucher use
 * Usage is recorded by whichever service completes orders, not by the cart
 */

export interface VoucherUsageServicePort {
  hasUsedVoucher(input: { customerId: string; code: string }): Promise<boolean>;
}
