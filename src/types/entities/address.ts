/**
 * Address entity type definitions
 */

import type { FieldFilters, IEntity, ITimestamped } from '../base';

export interface AddressFields {
  street: string;
  city: string;
  state: string;
  postal_code: string;
  country: string;
}

/** Address value as embedded inside another record */
export interface EmbeddedAddress extends IEntity, AddressFields {}

export interface IAddress extends EmbeddedAddress, ITimestamped {}

export type AddressFilterField = keyof AddressFields;

export type AddressFilters = FieldFilters<AddressFilterField>;

export type AddressCreateData = EmbeddedAddress;

export type AddressUpdateData = Partial<AddressFields>;
