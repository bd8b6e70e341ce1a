/**
 * Repository interface definitions
 */

export interface IRepository<T, F = Record<string, never>> {
  findAll(filters: F, traceId: string): Promise<T[]>;
  findByKey(key: string, traceId: string): Promise<T | null>;
  exists(key: string): boolean;
  insert(entity: T, traceId: string): Promise<T>;
  save(entity: T, traceId: string): Promise<T>;
  delete(key: string, traceId: string): Promise<boolean>;
}
