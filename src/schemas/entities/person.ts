/**
 * Person entity validation schemas
 */

import { z } from 'zod';
import {
  calendarDateSchema,
  emailSchema,
  filterValueSchema,
  requiredTextSchema,
  uuidSchema,
} from '../base';
import { addressCreateSchema } from './address';

export const personFieldsSchema = z.object({
  uni: requiredTextSchema,
  first_name: requiredTextSchema,
  last_name: requiredTextSchema,
  email: emailSchema,
  phone: z.string().nullable().default(null),
  birth_date: calendarDateSchema.nullable().default(null),
  addresses: z.array(addressCreateSchema).default([]),
});

// Any "id" in the payload is stripped; the server always assigns a fresh one
export const personCreateSchema = personFieldsSchema;

// Defaults are dropped so that omitted fields stay omitted
export const personUpdateSchema = z
  .object({
    uni: requiredTextSchema,
    first_name: requiredTextSchema,
    last_name: requiredTextSchema,
    email: emailSchema,
    phone: z.string().nullable(),
    birth_date: calendarDateSchema.nullable(),
    addresses: z.array(addressCreateSchema),
  })
  .partial();

export const personSchema = personFieldsSchema.extend({
  id: uuidSchema,
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
});

export const personQuerySchema = z.object({
  uni: filterValueSchema,
  first_name: filterValueSchema,
  last_name: filterValueSchema,
  email: filterValueSchema,
  phone: filterValueSchema,
  birth_date: filterValueSchema,
  city: filterValueSchema,
  country: filterValueSchema,
});

export type PersonCreateSchema = z.infer<typeof personCreateSchema>;
export type PersonUpdateSchema = z.infer<typeof personUpdateSchema>;
export type PersonQuerySchema = z.infer<typeof personQuerySchema>;
