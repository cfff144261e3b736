/**
 * LLM-backed classifier deciding whether a product title names an anime work.
 */

import type { LLMMessage, LLMProvider } from '../llm';
import { Classification } from '../types/collection';
import { ClassificationUnavailableError, toError } from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';
import { getMetricsCollector, type MetricsCollector } from '../utils/metrics';
import type { Classifier } from './types';

const SYSTEM_PROMPT = '質問には「はい」または「いいえ」で始めて簡潔に答えてください。';

const NEGATIVE_MARKERS = ['いいえ', 'ではありません', 'ではない'];
const POSITIVE_MARKER = 'はい';
const TOPIC_MARKER = 'アニメ';

export function buildPrompt(key: string): string {
  return `このタイトルはアニメ作品ですか?(タイトル: ${key})`;
}

/**
 * Read a free-text answer. A negative marker anywhere wins; otherwise はい or a
 * mention of アニメ means POSITIVE. Anything else is NEGATIVE.
 */
export function parseClassifierResponse(text: string): Classification {
  const hasNegative = NEGATIVE_MARKERS.some((marker) => text.includes(marker));
  if (hasNegative) {
    return Classification.NEGATIVE;
  }

  if (text.includes(POSITIVE_MARKER) || text.includes(TOPIC_MARKER)) {
    return Classification.POSITIVE;
  }

  return Classification.NEGATIVE;
}

export interface TitleClassifierDependencies {
  llmProvider: LLMProvider;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export class LLMTitleClassifier implements Classifier {
  private readonly provider: LLMProvider;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(dependencies: TitleClassifierDependencies) {
    this.provider = dependencies.llmProvider;
    this.logger = (dependencies.logger ?? getLogger()).child({ service: 'title-classifier' });
    this.metrics = dependencies.metrics ?? getMetricsCollector();
  }

  async classify(key: string): Promise<Classification> {
    const messages: LLMMessage[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: buildPrompt(key) }
    ];

    const started = Date.now();
    let text: string;
    try {
      const result = await this.provider.complete({
        messages,
        correlationId: this.logger.getCorrelationId()
      });
      text = result.text.trim();
      this.metrics.trackApiCall(`classifier:${this.provider.id}`, Date.now() - started, true);
    } catch (error) {
      this.metrics.trackApiCall(`classifier:${this.provider.id}`, Date.now() - started, false);
      throw new ClassificationUnavailableError(key, toError(error).message);
    }

    const classification = parseClassifierResponse(text);
    this.logger.debug(`Classifier answered for "${key}"`, {
      response: text.slice(0, 50),
      classification
    });

    return classification;
  }
}
