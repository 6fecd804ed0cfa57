export * from './logger';
export * from './persistence';
