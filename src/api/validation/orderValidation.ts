import { z } from "zod";
import { MAX_ITEM_QUANTITY } from "@/types";
import { optionalDate, optionalNumber, pageQuerySchema } from "./common";

// Quantity and item-count rules are enforced by the order service so that
// they are reported in the same order as the other creation checks.
export const orderLineSchema = z.object({
  productId: z.number().int().positive("Product ID must be a positive integer"),
  quantity: z
    .number()
    .int("Quantity must be a whole number")
    .max(MAX_ITEM_QUANTITY, `Quantity must be at most ${MAX_ITEM_QUANTITY}`),
});

export const createOrderSchema = z.object({
  customerId: z.number().int().positive("Customer ID must be a positive integer"),
  items: z.array(orderLineSchema),
});

export const orderListQuerySchema = pageQuerySchema.extend({
  customerId: optionalNumber,
  fromDate: optionalDate,
  toDate: optionalDate,
  minAmount: optionalNumber,
  maxAmount: optionalNumber,
});

export const recentOrdersQuerySchema = z.object({
  days: z.coerce.number().int().optional(),
});

export const revenueQuerySchema = z.object({
  fromDate: optionalDate,
  toDate: optionalDate,
  period: z.string().optional(),
});

export const orderNumberParamSchema = z.object({
  orderNumber: z.string().trim().min(1, "Order number is required"),
});

export const customerIdParamSchema = z.object({
  customerId: z.coerce.number().int().positive("Customer ID must be a positive integer"),
});

export type CreateOrderBody = z.infer<typeof createOrderSchema>;
