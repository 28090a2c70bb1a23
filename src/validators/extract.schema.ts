import { z } from "zod";
import { httpUrlSchema, RestaurantConfigSchema } from "./restaurant-config.schema";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export const ResourceInputSchema = z.object({
  url: httpUrlSchema,
  contentType: z.string().trim().min(1).optional(),
  content: z
    .string()
    .min(1, "content cannot be empty")
    .refine((val) => BASE64_PATTERN.test(val.replace(/\s+/g, "")), { message: "content must be base64" })
    .optional(),
  hint: z.string().trim().min(1).optional(),
  menuName: z.string().trim().min(1).optional(),
  location: z.string().trim().min(1).optional()
});

export const ExtractInputSchema = z.object({
  restaurant: RestaurantConfigSchema,
  resources: z.array(ResourceInputSchema).min(1, "resources must contain at least one entry"),
  format: z.enum(["nested", "flat"]).default("nested")
});

export type ResourceInputBody = z.infer<typeof ResourceInputSchema>;
export type ExtractInput = z.input<typeof ExtractInputSchema>;
