/**
 * Job entity validation schemas
 */

import { z } from 'zod';
import { calendarDateSchema, generatedUuidSchema, requiredTextSchema } from '../base';

export const jobSchema = z.object({
  id: generatedUuidSchema,
  title: requiredTextSchema,
  company: requiredTextSchema,
  start_date: calendarDateSchema,
  end_date: calendarDateSchema.nullable().default(null),
  is_current: z.boolean().default(true),
});

// Job keys are compared as strings, so the path segment is not format-checked
export const jobIdParamSchema = z.object({
  id: z.string().min(1),
});

export type JobSchema = z.infer<typeof jobSchema>;
