export * from './base-provider';
export * from './chained-provider';
export * from './errors';
export * from './factory';
export * from './openai-provider';
export type { LLMProvider } from './provider';
export * from './types';
