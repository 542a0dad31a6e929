/**
 * Shared types for the slot monitor
 */

export * from './monitor.js';
export * from './persistence.js';
