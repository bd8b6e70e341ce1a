/**
 * Age repository implementation, keyed by person name
 */

import { BaseRepository } from '../core/BaseRepository';
import type { IAge } from '../types';

export class AgeRepository extends BaseRepository<IAge> {
  constructor() {
    super('Age record');
  }

  protected keyOf(age: IAge): string {
    return age.person_name;
  }

  protected matches(): boolean {
    return true;
  }
}
