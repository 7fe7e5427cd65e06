/**
 * Record Reconciler - converge two record stores over shared resource types
 *
 * @example
 * ```typescript
 * import { Reconciler, MemoryStoreAdapter, HttpStoreAdapter, RESOLUTION_STRATEGY } from 'record-reconciler';
 *
 * const local = new MemoryStoreAdapter({ name: 'local', resourceTypes: ['users'] });
 * const remote = new HttpStoreAdapter({ baseUrl: 'https://api.example.com', resources: ['users'] });
 * const reconciler = new Reconciler({ adapterA: local, adapterB: remote, strategy: RESOLUTION_STRATEGY.LATEST_WINS });
 *
 * // Listen for conflicts
 * reconciler.on('conflict:detected', ({ resourceType, conflict }) => {
 *   console.log(`${resourceType}/${conflict.key} differs in ${conflict.fieldsChanged.join(', ')}`);
 * });
 *
 * const report = await reconciler.run(['users']);
 * ```
 */

// Core types and interfaces
export type * from './types';
export type * from './interfaces';

// Utilities
export * from './utils';

// Enums and errors
export * from './enums';
export * from './errors';

// Logging and events
export * from './logger';
export * from './event-emitter';

// Pipeline stages
export * from './intersection-scanner';
export * from './conflict-detector';
export * from './conflict-resolvers';
export * from './resolution-engine';
export * from './safety-guard';
export * from './report-builder';
export * from './report-emitter';
export * from './async';

// Main reconciler and config entry point
export * from './reconciler';
export * from './config';

// Store adapters
export * from './adapters';
