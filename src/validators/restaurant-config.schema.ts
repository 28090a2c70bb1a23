import { z } from "zod";

export const httpUrlSchema = z
  .string()
  .trim()
  .min(1, "URL cannot be empty")
  .refine(
    (val) => val.startsWith("http://") || val.startsWith("https://"),
    { message: "URL must start with http:// or https://" }
  );

const selectorSchema = z.string().trim().min(1);

export const SelectorHintsSchema = z.object({
  container: selectorSchema.optional(),
  section: selectorSchema.optional(),
  item: selectorSchema.optional(),
  name: selectorSchema.optional(),
  description: selectorSchema.optional(),
  price: selectorSchema.optional(),
  exclude: z.array(selectorSchema).optional()
});

export const PriceLocaleSchema = z.object({
  currency: z
    .string()
    .trim()
    .regex(/^[A-Za-z]{3}$/, "currency must be a 3-letter ISO code")
    .transform((val) => val.toUpperCase())
});

export const RestaurantConfigSchema = z.object({
  name: z.string().trim().min(1, "restaurant name cannot be empty"),
  url: httpUrlSchema,
  location: z.string().trim().min(1).optional(),
  selectorHints: SelectorHintsSchema.optional(),
  denylist: z.array(z.string().trim().min(1)).optional(),
  locale: PriceLocaleSchema.optional()
});
