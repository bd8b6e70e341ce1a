export * from './base';
export * from './entities/address';
export * from './entities/person';
export * from './entities/age';
export * from './entities/job';
export * from './entities/health';
