import { z } from "zod";
import { optionalText, pageQuerySchema, requiredText } from "./common";

export const customerSchema = z.object({
  firstName: requiredText("First name", 50),
  lastName: requiredText("Last name", 50),
  city: optionalText(100),
  country: optionalText(50),
  phone: optionalText(20),
});

export const customerListQuerySchema = pageQuerySchema.extend({
  country: z.string().optional(),
  city: z.string().optional(),
  search: z.string().optional(),
});

export type CustomerRequest = z.infer<typeof customerSchema>;
