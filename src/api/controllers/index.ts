import { AddressController } from './AddressController';
import { AgeController } from './AgeController';
import { HealthController } from './HealthController';
import { JobController } from './JobController';
import { PersonController } from './PersonController';
import type { DataStore } from '../../core/DataStore';
import { AddressService } from '../../services/AddressService';
import { AgeService } from '../../services/AgeService';
import { JobService } from '../../services/JobService';
import { PersonService } from '../../services/PersonService';
import type { HostAddressResolver } from '../../types';

export interface Controllers {
  addressController: AddressController;
  personController: PersonController;
  ageController: AgeController;
  jobController: JobController;
  healthController: HealthController;
}

export interface ControllerOptions {
  resolveHostAddress?: HostAddressResolver;
}

/**
 * Wire services and controllers over a single data store
 */
export function createControllers(store: DataStore, options: ControllerOptions = {}): Controllers {
  const addressService = new AddressService(store.addresses);
  const personService = new PersonService(store.persons);
  const ageService = new AgeService(store.ages);
  const jobService = new JobService(store.jobs);

  return {
    addressController: new AddressController(addressService),
    personController: new PersonController(personService),
    ageController: new AgeController(ageService),
    jobController: new JobController(jobService),
    healthController: new HealthController(options.resolveHostAddress),
  };
}

export { AddressController, AgeController, HealthController, JobController, PersonController };
