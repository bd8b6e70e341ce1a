/**
 * Age entity validation schemas
 */

import { z } from 'zod';
import { calendarDateSchema, requiredTextSchema } from '../base';

export const ageSchema = z.object({
  person_name: requiredTextSchema,
  birth_date: calendarDateSchema,
  current_age: z.number().int().min(0, 'Age must be non-negative').nullable().default(null),
});

export const personNameParamSchema = z.object({
  personName: z.string().min(1),
});

export type AgeSchema = z.infer<typeof ageSchema>;
