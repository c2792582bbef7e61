import { z } from "zod";

const AttributeValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string()),
]);

export const CandidateRecordSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  attributes: z.object({
    category: z.string().optional(),
    tags: z.array(z.string()).optional(),
    rating: z.number().optional(),
    priceRange: z.string().optional(),
    openingHours: z.string().optional(),
    contact: z.string().optional(),
    address: z.string().optional(),
    whyRecommended: z.string().optional(),
    extra: z.record(AttributeValueSchema).optional(),
  }),
});
