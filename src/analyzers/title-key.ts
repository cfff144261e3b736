/**
 * Classification keys: the first words of a product title
 */

import { TokenizerUnavailableError, toError } from '../utils/errors';
import { getLogger, type Logger } from '../utils/logger';
import { getMetricsCollector, type MetricsCollector } from '../utils/metrics';
import type { Tokenizer } from './types';

export const KEY_WORD_COUNT = 2;

const EDGE_SYMBOLS = /^[\p{P}\p{S}]+|[\p{P}\p{S}]+$/gu;
const HAS_WORD_CHAR = /[\p{L}\p{N}]/u;

/**
 * Whitespace-delimited words, NFKC-normalized, with surrounding punctuation
 * and symbols removed. Pieces with no letter or digit are dropped.
 */
export class WordTokenizer implements Tokenizer {
  tokenize(text: string): string[] {
    return text
      .normalize('NFKC')
      .split(/\s+/)
      .map((piece) => piece.replace(EDGE_SYMBOLS, ''))
      .filter((piece) => HAS_WORD_CHAR.test(piece));
  }
}

export function naiveSplit(text: string): string[] {
  return text.split(/\s+/).filter((piece) => piece.length > 0);
}

export interface TitleKeyOptions {
  tokenizer?: Tokenizer;
  wordCount?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export class TitleKeyDeriver {
  private readonly tokenizer?: Tokenizer;
  private readonly wordCount: number;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private missingReported = false;

  constructor(options: TitleKeyOptions = {}) {
    this.tokenizer = options.tokenizer;
    this.wordCount = options.wordCount ?? KEY_WORD_COUNT;
    this.logger = (options.logger ?? getLogger()).child({ service: 'title-key' });
    this.metrics = options.metrics ?? getMetricsCollector();
  }

  /**
   * First wordCount tokens of the label joined by a space; '' for a blank label
   */
  derive(label: string): string {
    return this.tokens(label).slice(0, this.wordCount).join(' ');
  }

  private tokens(label: string): string[] {
    if (!this.tokenizer) {
      this.reportMissingTokenizer();
      return naiveSplit(label);
    }

    try {
      return this.tokenizer.tokenize(label);
    } catch (error) {
      const reason = toError(error).message;
      this.logger.warn('Tokenizer failed, falling back to whitespace split', {
        label,
        error: reason
      });
      this.metrics.trackDegradedMode('tokenizer', reason, 'item');
      return naiveSplit(label);
    }
  }

  private reportMissingTokenizer(): void {
    if (this.missingReported) {
      return;
    }
    this.missingReported = true;

    const error = new TokenizerUnavailableError('no tokenizer configured');
    this.logger.error('No tokenizer available, every key uses whitespace split', error);
    this.metrics.trackDegradedMode('tokenizer', error.message, 'global');
  }
}
