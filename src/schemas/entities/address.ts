/**
 * Address entity validation schemas
 */

import { z } from 'zod';
import { filterValueSchema, generatedUuidSchema, requiredTextSchema } from '../base';

export const addressFieldsSchema = z.object({
  street: requiredTextSchema,
  city: requiredTextSchema,
  state: requiredTextSchema,
  postal_code: requiredTextSchema,
  country: requiredTextSchema,
});

// Address creation schema; also used for addresses embedded in a person
export const addressCreateSchema = addressFieldsSchema.extend({
  id: generatedUuidSchema,
});

// Only fields present in the payload are applied; the ID is immutable
export const addressUpdateSchema = addressFieldsSchema.partial();

// Stored record, re-checked after a partial update is merged
export const addressSchema = addressCreateSchema.extend({
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
});

export const addressQuerySchema = z.object({
  street: filterValueSchema,
  city: filterValueSchema,
  state: filterValueSchema,
  postal_code: filterValueSchema,
  country: filterValueSchema,
});

export type AddressCreateSchema = z.infer<typeof addressCreateSchema>;
export type AddressUpdateSchema = z.infer<typeof addressUpdateSchema>;
export type AddressQuerySchema = z.infer<typeof addressQuerySchema>;
