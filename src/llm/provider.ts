import type { LLMCompletionRequest, LLMCompletionResult, LLMProviderId, LLMTokens } from './types';

export interface LLMProvider {
  readonly id: LLMProviderId | string;
  readonly model: string;
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResult>;
  getUsage?(): LLMTokens;
}
