import { z } from 'zod';
import { categorySchema } from '@code-verdict/config';
import { DegradedSignalSchema } from './degraded.js';
import { InsightSchema } from './insight.js';

export const ASSESSMENT_VERSION = '1.0.0';

export const AssessmentStatusEnum = z.enum(['scored', 'insufficient_signal']);
export type AssessmentStatus = z.infer<typeof AssessmentStatusEnum>;

export const QualityLevelEnum = z.enum(['excellent', 'good', 'acceptable', 'needs_review', 'insufficient_signal']);
export type QualityLevel = z.infer<typeof QualityLevelEnum>;

export const ExplanationEntrySchema = z.object({
  signalName: z.string(),
  category: categorySchema,
  value: z.number().min(0).max(1),
  /** Effective weight: category weight times the signal's confidence share */
  weight: z.number().min(0).max(1),
  /** Points this signal adds to overallScore */
  contribution: z.number(),
});
export type ExplanationEntry = z.infer<typeof ExplanationEntrySchema>;

const categoryRecord = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    structure: value,
    security: value,
    anomaly: value,
    predicted_quality: value,
  });

export const AssessmentSchema = z.object({
  assessmentVersion: z.literal(ASSESSMENT_VERSION),
  assessmentId: z.string().regex(/^[0-9a-f]{64}$/),
  codeUnitId: z.string(),
  status: AssessmentStatusEnum,
  overallScore: z.number().min(0).max(100).nullable(),
  qualityLevel: QualityLevelEnum,
  confidence: z.number().min(0).max(1),
  subscores: categoryRecord(z.number().min(0).max(1).nullable()),
  categoryWeights: categoryRecord(z.number().min(0).max(1)),
  explanation: z.array(ExplanationEntrySchema),
  summary: z.string(),
  degradedSignals: z.array(DegradedSignalSchema),
  insights: z.array(InsightSchema),
});
export type Assessment = z.infer<typeof AssessmentSchema>;
