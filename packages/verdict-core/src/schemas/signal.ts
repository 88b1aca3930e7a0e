import { z } from 'zod';
import { categorySchema } from '@code-verdict/config';

export const SeverityEnum = z.enum(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']);
export type Severity = z.infer<typeof SeverityEnum>;

export const SourceKindEnum = z.enum(['static', 'ml-anomaly', 'ml-quality', 'embedding']);
export type SourceKind = z.infer<typeof SourceKindEnum>;

/**
 * Declared scale of a producer's raw measurement
 */
export const ScaleSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('unit') }),
  z.object({ type: z.literal('range'), min: z.number().finite(), max: z.number().finite() }),
  z.object({ type: z.literal('unbounded'), min: z.number().finite().optional() }),
]);
export type Scale = z.infer<typeof ScaleSchema>;

/**
 * Whether a raw measurement lies inside its declared scale
 */
export function withinScale(raw: number, scale: Scale): boolean {
  if (!Number.isFinite(raw)) return false;
  switch (scale.type) {
    case 'unit':
      return raw >= 0 && raw <= 1;
    case 'range':
      return raw >= scale.min && raw <= scale.max;
    case 'unbounded':
      return scale.min === undefined || raw >= scale.min;
  }
}

export const ScalarSignalSchema = z.object({
  kind: z.literal('scalar'),
  name: z.string().min(1),
  category: categorySchema,
  sourceKind: SourceKindEnum,
  /** Normalized value, 1 is best quality */
  value: z.number().min(0).max(1),
  /** Measurement as the producer reported it */
  rawValue: z.number().finite(),
  scale: ScaleSchema,
  confidence: z.number().min(0).max(1),
});
export type ScalarSignal = z.infer<typeof ScalarSignalSchema>;

export const VectorSignalSchema = z.object({
  kind: z.literal('vector'),
  name: z.string().min(1),
  sourceKind: z.literal('embedding'),
  value: z.array(z.number().finite()).min(1),
  dimension: z.number().int().positive(),
  confidence: z.number().min(0).max(1),
});
export type VectorSignal = z.infer<typeof VectorSignalSchema>;

export const SignalSchema = z
  .discriminatedUnion('kind', [ScalarSignalSchema, VectorSignalSchema])
  .superRefine((signal, ctx) => {
    if (signal.kind === 'scalar' && !withinScale(signal.rawValue, signal.scale)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `rawValue ${signal.rawValue} is outside the declared ${signal.scale.type} scale`,
        path: ['rawValue'],
      });
    }
    if (signal.kind === 'vector' && signal.value.length !== signal.dimension) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `vector has ${signal.value.length} values, expected ${signal.dimension}`,
        path: ['dimension'],
      });
    }
  });
export type Signal = z.infer<typeof SignalSchema>;
