import { z } from "zod";
import { optionalText, pageQuerySchema, requiredText } from "./common";

export const supplierSchema = z.object({
  companyName: requiredText("Company name", 100),
  contactName: optionalText(100),
  city: optionalText(100),
  country: optionalText(50),
  phone: optionalText(20),
  fax: optionalText(20),
});

export const supplierListQuerySchema = pageQuerySchema.extend({
  country: z.string().optional(),
  city: z.string().optional(),
  search: z.string().optional(),
});

export type SupplierRequest = z.infer<typeof supplierSchema>;
