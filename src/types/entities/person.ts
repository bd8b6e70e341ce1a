/**
 * Person entity type definitions
 */

import type { FieldFilters, IEntity, ITimestamped } from '../base';
import type { EmbeddedAddress } from './address';

export interface PersonFields {
  uni: string;
  first_name: string;
  last_name: string;
  email: string;
  phone: string | null;
  birth_date: string | null;
  addresses: EmbeddedAddress[];
}

export interface IPerson extends IEntity, PersonFields, ITimestamped {}

export type PersonFilterField =
  | 'uni'
  | 'first_name'
  | 'last_name'
  | 'email'
  | 'phone'
  | 'birth_date'
  | 'city'
  | 'country';

export type PersonFilters = FieldFilters<PersonFilterField>;

export type PersonCreateData = PersonFields;

export type PersonUpdateData = Partial<PersonFields>;
