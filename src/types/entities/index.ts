export type * from './address';
export type * from './person';
export type * from './age';
export type * from './job';
export type * from './health';
