export type * from './contracts/state';
export * from './ports';
export * from './config';
export * from './errors';
export * from './lifecycle';
export * from './utils';
