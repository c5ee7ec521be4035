export * from './split.types';
export * from './units';
