/**
 * Base validation schemas using Zod
 * Provides reusable validation patterns
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';

// UUID validation; keys are stored in canonical lower case
export const uuidSchema = z
  .string()
  .uuid('Invalid UUID format')
  .transform(id => id.toLowerCase());

// Client may supply the ID; otherwise a fresh one is generated
export const generatedUuidSchema = uuidSchema.default(() => uuidv4());

export const idParamSchema = z.object({
  id: uuidSchema,
});

// Common field schemas
export const emailSchema = z.string().email('Invalid email format');

export const requiredTextSchema = z.string().min(1, 'Value cannot be empty');

// ISO-8601 calendar date (YYYY-MM-DD)
export const calendarDateSchema = z.string().date('Invalid date, expected YYYY-MM-DD');

// Query parameter helpers
export const filterValueSchema = z.string().optional();
