/**
 * Base type definitions - fundamental types used across the application
 */

export interface IEntity {
  id: string;
}

export interface ITimestamped {
  created_at: string;
  updated_at: string;
}

/**
 * Equality filters over the string-valued fields of a record.
 * An absent key places no constraint on that field.
 */
export type FieldFilters<K extends string> = Partial<Record<K, string>>;
