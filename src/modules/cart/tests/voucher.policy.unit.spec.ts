import { describe, expect, it } from "vitest";
import type { Voucher } from "../domain/cart.entity.js";
import {
  checkVoucherEligibility,
  computeDiscount,
} from "../domain/voucher.policy.js";

const NOW = new Date("2026-10-18T12:00:00.000Z");

function voucher(overrides: Partial<Voucher> = {}): Voucher {
  return {
    code: "SPRING",
    discountType: "FixedValue",
    value: 15,
    expirationDate: new Date("2026-12-31T23:59:59.000Z"),
    active: true,
    firstTimeUseOnly: false,
    ...overrides,
  };
}

describe("Voucher Policy", () => {
  describe("computeDiscount", () => {
    it("should take the percentage of the amount", () => {
      expect(
        computeDiscount(200, { code: "P", discountType: "Percentage", percentage: 10 }),
      ).toBe(20);
    });

    it("should round percentage discounts to cents", () => {
      expect(
        computeDiscount(19.99, { code: "P", discountType: "Percentage", percentage: 15 }),
      ).toBe(3);
    });

    it("should use the fixed value when it is below the amount", () => {
      expect(
        computeDiscount(50, { code: "F", discountType: "FixedValue", value: 15 }),
      ).toBe(15);
    });

    it("should cap the fixed value at the amount", () => {
      expect(
        computeDiscount(50, { code: "F", discountType: "FixedValue", value: 1000 }),
      ).toBe(50);
    });

    it("should give no discount on an empty cart", () => {
      expect(
        computeDiscount(0, { code: "F", discountType: "FixedValue", value: 15 }),
      ).toBe(0);
    });
  });

  describe("checkVoucherEligibility", () => {
    const context = { now: NOW, firstTimeUseConsumed: false };

    it("should accept an active voucher that has not expired", () => {
      expect(checkVoucherEligibility(voucher(), context)).toEqual({
        eligible: true,
      });
    });

    it("should accept a voucher expiring exactly now", () => {
      expect(
        checkVoucherEligibility(voucher({ expirationDate: NOW }), context),
      ).toEqual({ eligible: true });
    });

    it("should reject an inactive voucher", () => {
      expect(
        checkVoucherEligibility(voucher({ active: false }), context),
      ).toEqual({ eligible: false, reason: "Voucher SPRING is not active" });
    });

    it("should reject an expired voucher", () => {
      expect(
        checkVoucherEligibility(
          voucher({ expirationDate: new Date("2026-10-18T11:59:59.999Z") }),
          context,
        ),
      ).toEqual({ eligible: false, reason: "Voucher SPRING has expired" });
    });

    it("should reject a first-time voucher the customer already used", () => {
      expect(
        checkVoucherEligibility(voucher({ firstTimeUseOnly: true }), {
          now: NOW,
          firstTimeUseConsumed: true,
        }),
      ).toEqual({
        eligible: false,
        reason: "Voucher SPRING can only be used on a first purchase",
      });
    });

    it("should ignore past use for vouchers without the first-time flag", () => {
      expect(
        checkVoucherEligibility(voucher(), {
          now: NOW,
          firstTimeUseConsumed: true,
        }),
      ).toEqual({ eligible: true });
    });
  });
});
