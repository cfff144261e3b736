export type LLMProviderId = 'openai_gpt4o_mini' | 'openrouter';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMCompletionRequest {
  messages: LLMMessage[];
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  correlationId?: string;
}

export interface LLMCompletionResult {
  providerId: LLMProviderId | string;
  text: string;
  finishReason: string;
  usage?: LLMTokens;
}

export interface LLMTokens {
  prompt: number;
  completion: number;
  total: number;
}

export interface LLMRetryConfig {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface LLMTimeoutConfig {
  requestMs: number;
}

export interface LLMProviderInit {
  providerId: LLMProviderId | string;
  apiKey?: string;
  /** OpenAI-compatible endpoint, e.g. OpenRouter */
  baseURL?: string;
  defaultHeaders?: Record<string, string>;
  model: string;
  temperature: number;
  topP: number;
  maxTokens: number;
  retries?: Partial<LLMRetryConfig>;
  timeouts?: Partial<LLMTimeoutConfig>;
}
