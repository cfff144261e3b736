import { BaseError } from '../utils/errors';

export class LLMProviderError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(`LLM provider error: ${message}`, context);
  }
}

export class LLMProviderAggregateError extends LLMProviderError {
  constructor(
    message: string,
    public readonly errors: Error[]
  ) {
    super(message, {
      causes: errors.map((err) => ({
        name: err.name,
        message: err.message
      }))
    });
  }
}
