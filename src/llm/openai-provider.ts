import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources';
import { BaseLLMProvider } from './base-provider';
import { LLMProviderError } from './errors';
import type { LLMCompletionRequest, LLMCompletionResult, LLMProviderInit, LLMTokens } from './types';

/**
 * Chat completions against OpenAI or any OpenAI-compatible endpoint (OpenRouter)
 */
export class OpenAIChatProvider extends BaseLLMProvider {
  private readonly client: OpenAI;

  constructor(options: LLMProviderInit, client?: OpenAI) {
    super(options);

    if (!options.apiKey && !client) {
      throw new LLMProviderError('An API key is required for OpenAI-compatible providers', {
        providerId: options.providerId
      });
    }

    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        defaultHeaders: options.defaultHeaders,
        timeout: this.timeoutMs,
        maxRetries: 0
      });
  }

  protected async doComplete(request: LLMCompletionRequest): Promise<LLMCompletionResult> {
    const messages: ChatCompletionMessageParam[] = request.messages.map((message) => ({
      role: message.role,
      content: message.content
    }));

    const maxTokens = Math.min(request.maxTokens ?? this.maxTokens, this.maxTokens);

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages,
      temperature: request.temperature ?? this.temperature,
      top_p: request.topP ?? this.topP,
      max_tokens: maxTokens
    });

    const choice = response.choices?.[0];

    if (!choice || !choice.message?.content) {
      throw new LLMProviderError('Provider returned an empty response', {
        providerId: this.providerId
      });
    }

    return {
      providerId: this.providerId,
      text: choice.message.content,
      finishReason: choice.finish_reason ?? 'unknown',
      usage: this.extractUsage(response.usage)
    };
  }

  private extractUsage(usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  }): LLMTokens | undefined {
    if (!usage) {
      return undefined;
    }

    return {
      prompt: usage.prompt_tokens ?? 0,
      completion: usage.completion_tokens ?? 0,
      total: usage.total_tokens ?? 0
    };
  }
}
