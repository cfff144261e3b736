import type { Classification } from '../types/collection';

/**
 * Three-valued judgement of one classification key. Implementations throw
 * ClassificationUnavailableError when they cannot answer.
 */
export interface Classifier {
  classify(key: string): Promise<Classification>;
}

export interface Tokenizer {
  tokenize(text: string): string[];
}
