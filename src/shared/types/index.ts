/**
 * Shared types index - barrel export
 */

export * from './device';
export * from './execution';
export * from './events';
export * from './settings';
export * from './ssh';
