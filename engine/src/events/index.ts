export * from './RunnerEvents.js';
export * from './EventBus.js';
