/**
 * Error Handling
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './RunnerError.js';
export * from './ConfigError.js';
export * from './DiscoveryError.js';
export * from './DispatchError.js';
export * from './ErrorFormatter.js';
