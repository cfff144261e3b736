import { type RetryConfig, retry } from '../utils/retry';
import { LLMProviderError } from './errors';
import type { LLMProvider } from './provider';
import type {
  LLMCompletionRequest,
  LLMCompletionResult,
  LLMProviderId,
  LLMProviderInit,
  LLMTokens
} from './types';

export abstract class BaseLLMProvider implements LLMProvider {
  protected promptTokensConsumed = 0;
  protected completionTokensConsumed = 0;

  protected readonly providerId: LLMProviderId | string;
  protected readonly providerModel: string;
  protected readonly temperature: number;
  protected readonly topP: number;
  protected readonly maxTokens: number;
  protected readonly retryConfig: RetryConfig = {
    maxAttempts: 2,
    baseDelay: 500,
    maxDelay: 4000,
    jitter: 0.2
  };
  protected readonly timeoutMs: number;

  constructor(protected readonly options: LLMProviderInit) {
    this.providerId = options.providerId;
    this.providerModel = options.model;
    this.temperature = options.temperature;
    this.topP = options.topP;
    this.maxTokens = options.maxTokens;
    this.timeoutMs = options.timeouts?.requestMs ?? 30000;

    if (options.retries) {
      this.retryConfig.maxAttempts = options.retries.attempts ?? this.retryConfig.maxAttempts;
      this.retryConfig.baseDelay = options.retries.baseDelayMs ?? this.retryConfig.baseDelay;
      this.retryConfig.maxDelay = options.retries.maxDelayMs ?? this.retryConfig.maxDelay;
    }
  }

  get id(): string {
    return this.providerId;
  }

  get model(): string {
    return this.providerModel;
  }

  getUsage(): LLMTokens {
    return {
      prompt: this.promptTokensConsumed,
      completion: this.completionTokensConsumed,
      total: this.promptTokensConsumed + this.completionTokensConsumed
    };
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResult> {
    const execute = async () => {
      const response = await this.doComplete(request);
      if (response.usage) {
        this.promptTokensConsumed += response.usage.prompt;
        this.completionTokensConsumed += response.usage.completion;
      }
      return response;
    };

    try {
      return await retry(execute, this.retryConfig);
    } catch (error) {
      throw new LLMProviderError(
        error instanceof Error ? error.message : String(error),
        this.buildContext(request.correlationId)
      );
    }
  }

  protected buildContext(correlationId?: string): Record<string, unknown> {
    return {
      providerId: this.providerId,
      model: this.providerModel,
      correlationId
    };
  }

  protected abstract doComplete(request: LLMCompletionRequest): Promise<LLMCompletionResult>;
}
