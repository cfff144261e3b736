/**
 * Central export point for all type definitions
 */

export * from './collection';
export * from './result';
export * from './session';
