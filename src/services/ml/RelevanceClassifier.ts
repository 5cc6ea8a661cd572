import { ClassificationResult } from '../../types/models';
import { RelevanceModel } from './RelevanceModel';
import { ngrams, tokenize } from './tokenize';

export interface RelevanceClassifierOptions {
  threshold?: number; // overrides the model's own threshold
  reviewMargin?: number;
}

/**
 * TF-IDF + logistic regression relevance gate.
 * Stateless apart from the immutable model it is built with.
 */
export class RelevanceClassifier {
  readonly threshold: number;
  readonly reviewMargin: number;

  constructor(private readonly model: RelevanceModel, options: RelevanceClassifierOptions = {}) {
    this.threshold = options.threshold ?? model.threshold;
    this.reviewMargin = options.reviewMargin ?? 0;
  }

  get modelVersion(): string {
    return this.model.version;
  }

  /**
   * Probability in [0, 1] that the text is about a job application
   */
  score(text: string): number {
    const counts = new Map<number, number>();
    for (const term of ngrams(tokenize(text), [this.model.ngramRange[0], this.model.ngramRange[1]])) {
      const index = this.model.vocabulary.get(term);
      if (index !== undefined) {
        counts.set(index, (counts.get(index) ?? 0) + 1);
      }
    }

    const features: Array<[number, number]> = [];
    let sumSquares = 0;
    for (const [index, count] of counts) {
      const value = count * this.model.idf[index];
      features.push([index, value]);
      sumSquares += value * value;
    }

    const norm = Math.sqrt(sumSquares);
    let z = this.model.bias;
    if (norm > 0) {
      for (const [index, value] of features) {
        z += this.model.weights[index] * (value / norm);
      }
    }

    return sigmoid(z);
  }

  isRelevant(text: string): boolean {
    return this.score(text) >= this.threshold;
  }

  classify(messageId: string, text: string): ClassificationResult {
    const score = this.score(text);
    const isRelevant = score >= this.threshold;
    return {
      messageId,
      score,
      isRelevant,
      needsReview: !isRelevant && score >= this.threshold - this.reviewMargin
    };
  }
}

export function sigmoid(z: number): number {
  if (z >= 0) {
    return 1 / (1 + Math.exp(-z));
  }
  const e = Math.exp(z);
  return e / (1 + e);
}
