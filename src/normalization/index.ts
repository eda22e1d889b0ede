export * from './types';
export * from './levels';
export * from './trim';
export * from './replace';
export * from './filter';
export * from './variations';
