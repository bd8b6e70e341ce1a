/**
 * Person repository implementation
 * Adds matching on the addresses embedded in each person
 */

import { BaseRepository, matchesFieldFilters } from '../core/BaseRepository';
import type { IPerson, PersonFilters } from '../types';

const PERSON_FIELD_FILTERS = [
  'uni',
  'first_name',
  'last_name',
  'email',
  'phone',
  'birth_date',
] as const;

export class PersonRepository extends BaseRepository<IPerson, PersonFilters> {
  constructor() {
    super('Person');
  }

  protected keyOf(person: IPerson): string {
    return person.id;
  }

  protected matches(person: IPerson, filters: PersonFilters): boolean {
    if (!matchesFieldFilters(person, filters, PERSON_FIELD_FILTERS)) {
      return false;
    }

    const { city, country } = filters;
    if (city !== undefined && !person.addresses.some(address => address.city === city)) {
      return false;
    }
    if (country !== undefined && !person.addresses.some(address => address.country === country)) {
      return false;
    }

    return true;
  }
}
