export * from './types';
export * from './tokens';
export * from './ast-builder';
