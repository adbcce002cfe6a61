export * from './errors';
export * from './config';
export * from './manifest';
export * from './transport';
export * from './db';
export * from './snapshotCache';
export * from './snapshotLoader';
export * from './queryEngine';
export * from './search/searchService';
export * from './mailboxSession';
