export * from './key-provider';
export * from './session-manager';
export * from './session-store';
export * from './types';
