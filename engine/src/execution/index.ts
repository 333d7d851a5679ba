/**
 * Worker dispatch
 *
 * @module execution
 */

export * from './WorkerLauncher.js';
export * from './DispatchResult.js';
export * from './SpawnLauncher.js';
