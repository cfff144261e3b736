import { type LlmFile, loadLlmConfig } from '../config';
import { getLogger, type Logger } from '../utils/logger';
import { ChainedLLMProvider } from './chained-provider';
import { LLMProviderError } from './errors';
import { OpenAIChatProvider } from './openai-provider';
import type { LLMProvider } from './provider';
import type { LLMProviderId, LLMProviderInit } from './types';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export interface LLMFactoryOptions {
  /** Provider picked by AI_PROVIDER; goes to the front of the chain */
  preferred?: 'openai' | 'openrouter';
  apiKeys?: Partial<Record<LLMProviderId, string>>;
  model?: string;
  configPath?: string;
  /** Already-loaded llm.yaml, skips the file read */
  config?: LlmFile;
  logger?: Logger;
}

const PROVIDER_MODEL_DEFAULTS: Record<LLMProviderId, string> = {
  openai_gpt4o_mini: 'gpt-4o-mini',
  openrouter: 'openai/gpt-4o-mini'
};

const KNOWN_PROVIDERS: readonly LLMProviderId[] = ['openai_gpt4o_mini', 'openrouter'];

function isKnownProvider(id: string): id is LLMProviderId {
  return KNOWN_PROVIDERS.some((known) => known === id);
}

/**
 * OpenRouter model ids carry a vendor prefix; bare names are OpenAI models
 */
export function toOpenRouterModel(model: string): string {
  return model.includes('/') ? model : `openai/${model}`;
}

function preferredProviderId(preferred?: LLMFactoryOptions['preferred']): LLMProviderId | undefined {
  if (preferred === 'openrouter') {
    return 'openrouter';
  }
  if (preferred === 'openai') {
    return 'openai_gpt4o_mini';
  }
  return undefined;
}

function buildProviderInit(
  providerId: LLMProviderId,
  config: LlmFile,
  apiKey: string,
  model?: string
): LLMProviderInit {
  const base = {
    providerId,
    apiKey,
    temperature: config.temperature,
    topP: config.top_p,
    maxTokens: config.max_tokens,
    retries: {
      attempts: config.retries.attempts,
      baseDelayMs: config.retries.base_delay_ms,
      maxDelayMs: config.retries.max_delay_ms
    },
    timeouts: {
      requestMs: config.timeouts.request_ms
    }
  };

  if (providerId === 'openrouter') {
    return {
      ...base,
      baseURL: OPENROUTER_BASE_URL,
      defaultHeaders: { 'X-Title': 'auction-seller-scan' },
      model: model ? toOpenRouterModel(model) : PROVIDER_MODEL_DEFAULTS.openrouter
    };
  }

  return { ...base, model: model ?? PROVIDER_MODEL_DEFAULTS[providerId] };
}

/**
 * Ordered, de-duplicated provider chain: preferred provider, configured default, fallbacks
 */
export function resolveProviderChain(
  config: LlmFile,
  preferred?: LLMFactoryOptions['preferred']
): LLMProviderId[] {
  const requested = [
    preferredProviderId(preferred),
    config.default_provider,
    ...config.fallback_chain
  ]
    .filter((id): id is string => typeof id === 'string')
    .map((id) => id.trim())
    .filter(isKnownProvider);

  return requested.filter((id, index) => requested.indexOf(id) === index);
}

export async function createLLMProvider(options: LLMFactoryOptions = {}): Promise<LLMProvider> {
  const logger = (options.logger ?? getLogger()).child({ service: 'llm-factory' });
  const config = options.config ?? (await loadLlmConfig(options.configPath));
  const providerChain = resolveProviderChain(config, options.preferred);

  logger.debug('Provider chain resolved', { chain: providerChain });

  const providers: LLMProvider[] = [];
  const errors: Error[] = [];

  for (const providerId of providerChain) {
    const apiKey = options.apiKeys?.[providerId];
    if (!apiKey) {
      errors.push(new LLMProviderError(`Missing API key for ${providerId}`, { providerId }));
      continue;
    }

    // An explicit model only applies to the preferred provider
    const model = providerId === preferredProviderId(options.preferred) ? options.model : undefined;

    try {
      providers.push(new OpenAIChatProvider(buildProviderInit(providerId, config, apiKey, model)));
    } catch (error) {
      errors.push(error instanceof Error ? error : new Error(String(error)));
    }
  }

  if (errors.length > 0) {
    logger.warn('Some providers could not be instantiated', {
      errors: errors.map((err) => err.message)
    });
  }

  if (providers.length === 0) {
    throw new LLMProviderError('Unable to instantiate any LLM provider', {
      errors: errors.map((err) => err.message)
    });
  }

  if (providers.length === 1) {
    return providers[0];
  }

  return new ChainedLLMProvider(providers);
}
