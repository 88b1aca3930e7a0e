import { z } from 'zod';
import { SeverityEnum } from './signal.js';

export const SecurityFindingSchema = z.object({
  ruleId: z.string().min(1),
  severity: SeverityEnum,
  location: z.object({
    line: z.number().int().min(1),
    column: z.number().int().min(1).optional(),
  }),
  message: z.string().optional(),
});
export type SecurityFinding = z.infer<typeof SecurityFindingSchema>;
