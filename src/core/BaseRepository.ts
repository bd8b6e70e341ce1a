/**
 * Base repository implementation backed by an in-memory Map
 * Provides the common keyed operations shared by every table
 *
 * Each method completes its read-check-write sequence synchronously, so on
 * Node's single event-loop thread no two operations on a table interleave.
 */

import type { IRepository } from '../types';
import { ConflictError } from '../utils/error';
import { logger } from '../utils/logger';

export abstract class BaseRepository<T extends object, F extends object = Record<string, never>>
  implements IRepository<T, F>
{
  protected readonly records = new Map<string, T>();

  constructor(protected readonly entityName: string) {}

  /**
   * Key under which an entity is stored
   */
  protected abstract keyOf(entity: T): string;

  /**
   * Whether an entity satisfies every provided filter
   */
  protected abstract matches(entity: T, filters: F): boolean;

  /**
   * Find all entities matching the filters, in insertion order
   */
  public async findAll(filters: F, traceId: string): Promise<T[]> {
    const results: T[] = [];
    for (const entity of this.records.values()) {
      if (this.matches(entity, filters)) {
        results.push(structuredClone(entity));
      }
    }

    logger.withTrace(traceId).debug('Successfully fetched entities', {
      entity: this.entityName,
      total: this.records.size,
      returned: results.length,
    });

    return results;
  }

  /**
   * Find entity by key
   */
  public async findByKey(key: string, traceId: string): Promise<T | null> {
    const entity = this.records.get(key);

    if (!entity) {
      logger.withTrace(traceId).debug('Entity not found', { entity: this.entityName, key });
      return null;
    }

    return structuredClone(entity);
  }

  public exists(key: string): boolean {
    return this.records.has(key);
  }

  /**
   * Store a new entity, rejecting a key that is already taken
   */
  public async insert(entity: T, traceId: string): Promise<T> {
    const key = this.keyOf(entity);

    if (this.records.has(key)) {
      logger.withTrace(traceId).warn('Duplicate key rejected', { entity: this.entityName, key });
      throw new ConflictError(`${this.entityName} with this ID already exists`);
    }

    this.records.set(key, structuredClone(entity));
    return structuredClone(entity);
  }

  /**
   * Store an entity, overwriting any existing one under the same key
   */
  public async save(entity: T, traceId: string): Promise<T> {
    const key = this.keyOf(entity);
    const replaced = this.records.has(key);

    this.records.set(key, structuredClone(entity));

    logger.withTrace(traceId).debug('Entity saved', { entity: this.entityName, key, replaced });
    return structuredClone(entity);
  }

  /**
   * Remove entity by key; false when there was nothing to remove
   */
  public async delete(key: string, traceId: string): Promise<boolean> {
    const deleted = this.records.delete(key);

    logger.withTrace(traceId).debug('Entity delete attempted', {
      entity: this.entityName,
      key,
      deleted,
    });

    return deleted;
  }

  public count(): number {
    return this.records.size;
  }
}

/**
 * Conjunctive equality check over plain string fields.
 * Filters whose value is undefined are ignored; a null or missing field never matches.
 */
export function matchesFieldFilters<K extends string>(
  entity: { [P in K]: unknown },
  filters: Partial<Record<K, string>>,
  fields: readonly K[]
): boolean {
  return fields.every(field => {
    const expected = filters[field];
    if (expected === undefined) {
      return true;
    }
    const actual = entity[field];
    return actual !== null && actual !== undefined && String(actual) === expected;
  });
}
