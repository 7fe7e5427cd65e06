export * from './memory-store';
export * from './http-store';
export * from './postgres-store';
export * from './filesystem-store';
