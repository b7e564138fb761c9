import { pageQuerySchema } from "../src/api/validation/common";
import { updateOrderItemSchema } from "../src/api/validation/orderItemValidation";
import { createOrderSchema } from "../src/api/validation/orderValidation";
import { productPriceSchema } from "../src/api/validation/productValidation";

const messages = (result: { success: boolean; error?: { issues: { message: string }[] } }) =>
  result.error?.issues.map((issue) => issue.message) ?? [];

describe("request validation", () => {
  describe("unit price", () => {
    it.each([0.004, 0, -1])("should reject %p", (unitPrice) => {
      expect(messages(productPriceSchema.safeParse({ unitPrice }))).toEqual([
        "Unit price must be at least 0.01",
      ]);
    });

    it("should reject a price wider than the stored precision", () => {
      expect(
        messages(productPriceSchema.safeParse({ unitPrice: 100_000_000 }))
      ).toEqual(["Unit price must be at most 99999999.99"]);
    });

    it("should accept the bounds", () => {
      expect(productPriceSchema.safeParse({ unitPrice: 0.01 }).success).toBe(true);
      expect(
        productPriceSchema.safeParse({ unitPrice: 99_999_999.99 }).success
      ).toBe(true);
    });
  });

  describe("quantity", () => {
    it("should cap order lines at the largest storable quantity", () => {
      const result = createOrderSchema.safeParse({
        customerId: 1,
        items: [{ productId: 1, quantity: 2_147_483_648 }],
      });

      expect(messages(result)).toEqual(["Quantity must be at most 2147483647"]);
    });

    it("should cap item updates the same way", () => {
      expect(
        messages(updateOrderItemSchema.safeParse({ quantity: 2_147_483_648 }))
      ).toEqual(["Quantity must be at most 2147483647"]);
      expect(
        updateOrderItemSchema.safeParse({ quantity: 2_147_483_647 }).success
      ).toBe(true);
    });
  });

  describe("page", () => {
    it("should reject a page number beyond the safe integer range", () => {
      expect(pageQuerySchema.safeParse({ page: "1e20" }).success).toBe(false);
      expect(pageQuerySchema.safeParse({ page: "3" }).data).toEqual({ page: 3 });
    });
  });
});
