export * from './document';
export * from './identifiers';
export * from './json';
export * from './limit';
export * from './operation';
