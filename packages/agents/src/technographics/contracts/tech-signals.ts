/**
 * Technology Signal Contracts
 *
 * The signal bag is what website inspection produces and what the
 * classifier consumes. The profile is the classifier's output.
 *
 * @module technographics/contracts/tech-signals
 */

import { z } from 'zod';
import { CloudMaturitySchema } from '@cloud-prospector/lib';

// ===========================================
// Signal Bag
// ===========================================

export const TechCategorySchema = z.enum([
  'cloud_provider',
  'cms',
  'ecommerce',
  'analytics',
  'cdn',
  'database',
  'frontend',
  'backend',
]);

export type TechCategory = z.infer<typeof TechCategorySchema>;

export const TechSignalBagSchema = z.object({
  technologies: z
    .array(z.string())
    .describe('Distinct detected technology names'),

  categories: z
    .record(TechCategorySchema, z.array(z.string()))
    .default({})
    .describe('Detected technologies grouped by category'),

  aws_services: z
    .array(z.string())
    .default([])
    .describe('Managed-service indicators for the target cloud provider'),

  tech_count: z.number().int().nonnegative(),
});

export type TechSignalBag = z.infer<typeof TechSignalBagSchema>;

/** Request shape where tech_count may be omitted and is derived from technologies */
export const TechSignalInputSchema = TechSignalBagSchema.extend({
  tech_count: z.number().int().nonnegative().optional(),
}).transform((input): TechSignalBag => ({
  ...input,
  tech_count: input.tech_count ?? new Set(input.technologies).size,
}));

// ===========================================
// Classification Output
// ===========================================

export const UrgencySchema = z.enum(['low', 'medium', 'high']);

export type Urgency = z.infer<typeof UrgencySchema>;

export const IntentIndicatorSchema = z.object({
  indicator: z.string(),
  points: z.number(),
});

export type IntentIndicator = z.infer<typeof IntentIndicatorSchema>;

export const IntentSignalsSchema = z.object({
  score: z.number().nonnegative(),
  urgency: UrgencySchema,
  indicators: z
    .array(IntentIndicatorSchema)
    .describe('Each contribution to the score, kept for explainability'),
});

export type IntentSignals = z.infer<typeof IntentSignalsSchema>;

export const TechnographicProfileSchema = z.object({
  cloud_maturity: CloudMaturitySchema,
  migration_opportunities: z.array(z.string()),
  intent: IntentSignalsSchema,
  aws_usage: z.boolean(),
  competitor_cloud: z.string().nullable(),
});

export type TechnographicProfile = z.infer<typeof TechnographicProfileSchema>;

// ===========================================
// Validation Helpers
// ===========================================

/**
 * Parse a signal bag from an untrusted source
 * @throws ZodError if validation fails
 */
export function parseTechSignals(input: unknown): TechSignalBag {
  return TechSignalInputSchema.parse(input);
}

/**
 * Safely parse a signal bag, returning null on failure
 */
export function safeParseTechSignals(input: unknown): TechSignalBag | null {
  const result = TechSignalInputSchema.safeParse(input);
  return result.success ? result.data : null;
}
