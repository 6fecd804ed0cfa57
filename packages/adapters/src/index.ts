export * from './logger/pino';
export * from './logger/fake';
export * from './checkpoint/memory';

export * from './postgres/statements';
export * from './postgres/gateway';
export * from './postgres/persistence';
export * from './postgres/fake';

export * from './sqlserver/connection';
export * from './sqlserver/statements';
export * from './sqlserver/gateway';
export * from './sqlserver/persistence';
export * from './sqlserver/fake';

export * from './cosmos/connection-string';
export * from './cosmos/gateway';
export * from './cosmos/queries';
export * from './cosmos/persistence';
export * from './cosmos/fake';
