export * from './types';
export * from './errors';
export * from './constants';
export * from './utils/validation';
export * from './ast';
export * from './schema';
export * from './dialect';
export * from './middleware';
export * from './events';
export * from './query';
export { withTransaction } from './execution/transaction';
