/**
 * Process-wide record store
 *
 * Owns one repository per entity type. A single instance is built at start-up
 * and handed to the services; nothing reads the tables through module state.
 *
 * Synchronization: request handlers run on Node's single event-loop thread and
 * every repository operation finishes without yielding, so the event loop acts
 * as the single writer for all four tables and no explicit lock is needed.
 */

import { AddressRepository } from '../repositories/AddressRepository';
import { AgeRepository } from '../repositories/AgeRepository';
import { JobRepository } from '../repositories/JobRepository';
import { PersonRepository } from '../repositories/PersonRepository';

export class DataStore {
  public readonly addresses = new AddressRepository();
  public readonly persons = new PersonRepository();
  public readonly ages = new AgeRepository();
  public readonly jobs = new JobRepository();
}

export function createDataStore(): DataStore {
  return new DataStore();
}
