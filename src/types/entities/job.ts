/**
 * Job entity type definitions
 */

import type { IEntity } from '../base';

export interface IJob extends IEntity {
  title: string;
  company: string;
  start_date: string;
  end_date: string | null;
  is_current: boolean;
}
