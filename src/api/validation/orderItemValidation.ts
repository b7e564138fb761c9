import { z } from "zod";
import { MAX_ITEM_QUANTITY } from "@/types";
import { optionalDate } from "./common";

export const updateOrderItemSchema = z.object({
  quantity: z
    .number()
    .int("Quantity must be a whole number")
    .max(MAX_ITEM_QUANTITY, `Quantity must be at most ${MAX_ITEM_QUANTITY}`),
});

export const orderIdParamSchema = z.object({
  orderId: z.coerce.number().int().positive("Order ID must be a positive integer"),
});

export const productIdParamSchema = z.object({
  productId: z.coerce.number().int().positive("Product ID must be a positive integer"),
});

export const productSalesQuerySchema = z.object({
  fromDate: optionalDate,
  toDate: optionalDate,
});
