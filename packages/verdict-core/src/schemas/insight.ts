import { z } from 'zod';
import { categorySchema } from '@code-verdict/config';

export const InsightKindEnum = z.enum(['issue', 'strength', 'reference_match']);
export type InsightKind = z.infer<typeof InsightKindEnum>;

/**
 * A reviewer observation reported alongside the score. Insights never
 * change the score.
 */
export const InsightSchema = z.object({
  kind: InsightKindEnum,
  /** Stable identifier of the rule that produced it, e.g. `too_many_arguments` */
  code: z.string().min(1),
  category: categorySchema,
  message: z.string(),
  line: z.number().int().positive().optional(),
});
export type Insight = z.infer<typeof InsightSchema>;
