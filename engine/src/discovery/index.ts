/**
 * Workload discovery
 *
 * @module discovery
 */

export * from './WorkloadDiscovery.js';
