import { z } from "zod";
import {
  optionalBoolean,
  optionalNumber,
  optionalText,
  pageQuerySchema,
  requiredText,
} from "./common";

const unitPrice = z
  .number({ required_error: "Unit price is required" })
  .min(0.01, "Unit price must be at least 0.01")
  .max(99_999_999.99, "Unit price must be at most 99999999.99");

export const productSchema = z.object({
  productName: requiredText("Product name", 100),
  supplierId: z.number().int().positive("Supplier ID must be a positive integer"),
  unitPrice,
  package: optionalText(100),
  isDiscontinued: z.boolean().optional(),
});

export const productPriceSchema = z.object({ unitPrice });

export const supplierIdParamSchema = z.object({
  supplierId: z.coerce.number().int().positive("Supplier ID must be a positive integer"),
});

export const productListQuerySchema = pageQuerySchema.extend({
  supplierId: optionalNumber,
  minPrice: optionalNumber,
  maxPrice: optionalNumber,
  isDiscontinued: optionalBoolean,
  search: z.string().optional(),
});

export type ProductRequest = z.infer<typeof productSchema>;
