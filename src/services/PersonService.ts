/**
 * Business logic service for persons
 * Person IDs are always assigned here; a client-supplied ID is never used as the key
 */

import { v4 as uuidv4 } from 'uuid';
import type { PersonRepository } from '../repositories/PersonRepository';
import type { IPerson, PersonCreateData, PersonFilters, PersonUpdateData } from '../types';
import { personSchema } from '../schemas';
import { NotFoundError, ValidationError } from '../utils/error';
import { logger } from '../utils/logger';
import { formatZodIssues } from '../utils/validation';

export class PersonService {
  constructor(private readonly personRepository: PersonRepository) {}

  public async createPerson(data: PersonCreateData, traceId: string): Promise<IPerson> {
    const now = new Date().toISOString();

    const person: IPerson = {
      id: uuidv4(),
      uni: data.uni,
      first_name: data.first_name,
      last_name: data.last_name,
      email: data.email,
      phone: data.phone,
      birth_date: data.birth_date,
      addresses: data.addresses,
      created_at: now,
      updated_at: now,
    };

    const created = await this.personRepository.save(person, traceId);

    logger.withTrace(traceId).info('Person created', {
      id: created.id,
      addressCount: created.addresses.length,
    });

    return created;
  }

  public async getPersons(filters: PersonFilters, traceId: string): Promise<IPerson[]> {
    const log = logger.withTrace(traceId);

    log.info('Fetching persons', { filters });
    const persons = await this.personRepository.findAll(filters, traceId);
    log.info('Successfully fetched persons', { returned: persons.length });

    return persons;
  }

  public async getPersonById(id: string, traceId: string): Promise<IPerson> {
    const person = await this.personRepository.findByKey(id, traceId);

    if (!person) {
      logger.withTrace(traceId).warn('Person not found', { id });
      throw new NotFoundError('Person');
    }

    return person;
  }

  /**
   * Apply the fields present in the update over the stored person.
   * A provided address list replaces the embedded list as a whole.
   */
  public async updatePerson(
    id: string,
    updates: PersonUpdateData,
    traceId: string
  ): Promise<IPerson> {
    const log = logger.withTrace(traceId);
    const existing = await this.getPersonById(id, traceId);

    const result = personSchema.safeParse({
      ...existing,
      ...updates,
      id: existing.id,
      created_at: existing.created_at,
      updated_at: new Date().toISOString(),
    });

    if (!result.success) {
      log.warn('Merged person failed validation', { id });
      throw new ValidationError('Validation failed', formatZodIssues(result.error));
    }

    const updated = await this.personRepository.save(result.data, traceId);
    log.info('Person updated', { id, fields: Object.keys(updates) });

    return updated;
  }
}
