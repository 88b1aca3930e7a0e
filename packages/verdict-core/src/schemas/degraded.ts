import { z } from 'zod';

export const DegradedReasonEnum = z.enum([
  'missing',
  'out_of_domain',
  'parse_error',
  'timeout',
  'unavailable',
  'quorum_failure',
]);
export type DegradedReason = z.infer<typeof DegradedReasonEnum>;

/**
 * A signal that could not be computed and is reported instead of defaulted
 */
export const DegradedSignalSchema = z.object({
  name: z.string().min(1),
  reason: DegradedReasonEnum,
  detail: z.string().optional(),
});
export type DegradedSignal = z.infer<typeof DegradedSignalSchema>;
