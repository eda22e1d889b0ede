export * from './compare';
export * from './check';
