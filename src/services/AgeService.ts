/**
 * Business logic service for age records
 * Create and replace are upserts keyed by person name
 */

import type { AgeRepository } from '../repositories/AgeRepository';
import type { IAge } from '../types';
import { NotFoundError, ValidationError } from '../utils/error';
import { logger } from '../utils/logger';

export class AgeService {
  constructor(private readonly ageRepository: AgeRepository) {}

  public async createAge(age: IAge, traceId: string): Promise<IAge> {
    const replaced = this.ageRepository.exists(age.person_name);
    const saved = await this.ageRepository.save(age, traceId);

    logger.withTrace(traceId).info('Age record stored', {
      personName: saved.person_name,
      replaced,
    });

    return saved;
  }

  public async getAges(traceId: string): Promise<IAge[]> {
    return this.ageRepository.findAll({}, traceId);
  }

  public async getAge(personName: string, traceId: string): Promise<IAge> {
    const age = await this.ageRepository.findByKey(personName, traceId);

    if (!age) {
      logger.withTrace(traceId).warn('Age record not found', { personName });
      throw new NotFoundError('Age record');
    }

    return age;
  }

  /**
   * Replace the record under the path key; the key must match the payload.
   * The key check runs before, and independently of, any existence check.
   */
  public async replaceAge(personName: string, age: IAge, traceId: string): Promise<IAge> {
    if (personName !== age.person_name) {
      logger.withTrace(traceId).warn('Age key mismatch', {
        pathKey: personName,
        payloadKey: age.person_name,
      });
      throw new ValidationError('Person name in URL must match payload');
    }

    return this.createAge(age, traceId);
  }

  public async deleteAge(personName: string, traceId: string): Promise<void> {
    const deleted = await this.ageRepository.delete(personName, traceId);

    if (!deleted) {
      logger.withTrace(traceId).warn('Age record not found', { personName });
      throw new NotFoundError('Age record');
    }

    logger.withTrace(traceId).info('Age record deleted', { personName });
  }
}
