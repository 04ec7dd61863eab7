export * from './query-events';
export * from './query-logger';
