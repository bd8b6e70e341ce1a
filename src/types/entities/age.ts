/**
 * Age entity type definitions
 */

export interface IAge {
  person_name: string;
  birth_date: string;
  current_age: number | null;
}
