import { z } from "zod";

export const idParamSchema = z.object({
  id: z.coerce.number().int().positive("ID must be a positive integer"),
});

export const pageQuerySchema = z.object({
  page: z.coerce.number().int().max(Number.MAX_SAFE_INTEGER).optional(),
  pageSize: z.coerce.number().int().optional(),
});

export const searchTermParamSchema = z.object({
  term: z.string(),
});

export const countryQuerySchema = z.object({
  country: z.string().optional(),
});

export const optionalNumber = z.coerce.number().optional();

export const optionalDate = z.coerce.date().optional();

export const optionalBoolean = z
  .enum(["true", "false"])
  .transform((value) => value === "true")
  .optional();

/** Optional text column: blank becomes null. */
export const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max, `Must be at most ${max} characters`)
    .nullish()
    .transform((value) => value || null);

export const requiredText = (label: string, max: number) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .max(max, `${label} must be at most ${max} characters`);
