/**
 * Types barrel export
 */

export type * from './base';
export type * from './api';
export type * from './logging';
export type * from './services';
export type * from './entities';
