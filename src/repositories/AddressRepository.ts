/**
 * Address repository implementation
 */

import { BaseRepository, matchesFieldFilters } from '../core/BaseRepository';
import type { AddressFilterField, AddressFilters, IAddress } from '../types';

export const ADDRESS_FILTER_FIELDS: readonly AddressFilterField[] = [
  'street',
  'city',
  'state',
  'postal_code',
  'country',
];

export class AddressRepository extends BaseRepository<IAddress, AddressFilters> {
  constructor() {
    super('Address');
  }

  protected keyOf(address: IAddress): string {
    return address.id;
  }

  protected matches(address: IAddress, filters: AddressFilters): boolean {
    return matchesFieldFilters(address, filters, ADDRESS_FILTER_FIELDS);
  }
}
