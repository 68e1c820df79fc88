/**
 * Claim Classification Service
 *
 * Predicts the claim type from the document text and assigns a handling
 * priority.
 *
 * - Claim type: TF-IDF features + multinomial Naive Bayes, trained once at
 *   startup from the configuration's training samples
 * - Confidence: highest posterior probability across claim types
 * - Priority: keyword rule over the claim text, independent of confidence
 */

import { ClaimPriority } from '../../shared/schema';
import type { ClassificationResult } from '../../shared/types';
import { ConfigError, type TrainingExample } from '../config/appConfig';
import { loggers, logError } from '../lib/logger';

const log = loggers.classifier;

// Case-insensitive substring match against the claim text
export const HIGH_PRIORITY_KEYWORDS = ['major', 'fire', 'totaled', 'emergency', 'collision'] as const;

// Laplace smoothing
const ALPHA = 1;

const NOT_CLASSIFIED: ClassificationResult = { claimType: null, confidence: 0, priority: null };

// ============================================
// FEATURES
// ============================================

type SparseVector = Map<number, number>;

/**
 * Lowercase word tokens of two or more characters
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}_]{2,}/gu) ?? [];
}

export function derivePriority(text: string): ClaimPriority {
  const lowerText = text.toLowerCase();
  return HIGH_PRIORITY_KEYWORDS.some(keyword => lowerText.includes(keyword))
    ? ClaimPriority.HIGH
    : ClaimPriority.MEDIUM;
}

class TfidfVectorizer {
  private constructor(
    private readonly vocabulary: ReadonlyMap<string, number>,
    private readonly idf: readonly number[]
  ) {}

  static fit(documents: string[][]): TfidfVectorizer {
    const terms = [...new Set(documents.flat())].sort();
    const vocabulary = new Map(terms.map((term, index) => [term, index]));

    const documentFrequency = new Array<number>(terms.length).fill(0);
    for (const tokens of documents) {
      for (const term of new Set(tokens)) {
        const index = vocabulary.get(term);
        if (index !== undefined) {
          documentFrequency[index] += 1;
        }
      }
    }

    // Smoothed idf: ln((1 + n) / (1 + df)) + 1
    const n = documents.length;
    const idf = documentFrequency.map(df => Math.log((1 + n) / (1 + df)) + 1);

    return new TfidfVectorizer(vocabulary, idf);
  }

  get size(): number {
    return this.idf.length;
  }

  transform(tokens: string[]): SparseVector {
    const vector: SparseVector = new Map();
    for (const token of tokens) {
      const index = this.vocabulary.get(token);
      if (index !== undefined) {
        vector.set(index, (vector.get(index) ?? 0) + 1);
      }
    }

    let sumOfSquares = 0;
    for (const [index, count] of vector) {
      const weight = count * this.idf[index];
      vector.set(index, weight);
      sumOfSquares += weight * weight;
    }

    const norm = Math.sqrt(sumOfSquares);
    if (norm > 0) {
      for (const [index, weight] of vector) {
        vector.set(index, weight / norm);
      }
    }

    return vector;
  }
}

// ============================================
// CLASSIFIER
// ============================================

export class ClaimClassifier {
  private constructor(
    private readonly vectorizer: TfidfVectorizer,
    private readonly classes: readonly string[],
    private readonly classLogPrior: readonly number[],
    private readonly featureLogProb: readonly (readonly number[])[]
  ) {}

  /**
   * Train the model. Invalid training data is a startup error.
   */
  static train(samples: readonly TrainingExample[]): ClaimClassifier {
    if (samples.length < 2) {
      throw new ConfigError('Training data must contain at least 2 samples');
    }
    const invalid = samples.findIndex(sample => !sample.description.trim() || !sample.claimType.trim());
    if (invalid !== -1) {
      throw new ConfigError(`Training sample ${invalid} is missing a description or claim type`);
    }

    const documents = samples.map(sample => tokenize(sample.description));
    const vectorizer = TfidfVectorizer.fit(documents);
    const classes = [...new Set(samples.map(sample => sample.claimType))].sort();
    const classIndex = new Map(classes.map((claimType, index) => [claimType, index]));

    const classCounts = new Array<number>(classes.length).fill(0);
    const featureCounts = classes.map(() => new Array<number>(vectorizer.size).fill(0));

    samples.forEach((sample, i) => {
      const c = classIndex.get(sample.claimType) ?? 0;
      classCounts[c] += 1;
      for (const [index, weight] of vectorizer.transform(documents[i])) {
        featureCounts[c][index] += weight;
      }
    });

    const classLogPrior = classCounts.map(count => Math.log(count / samples.length));
    const featureLogProb = featureCounts.map(counts => {
      const total = counts.reduce((sum, value) => sum + value, 0) + ALPHA * vectorizer.size;
      return counts.map(count => Math.log((count + ALPHA) / total));
    });

    log.info(
      { samples: samples.length, claimTypes: classes, vocabularySize: vectorizer.size },
      'Claim classification model trained'
    );

    return new ClaimClassifier(vectorizer, classes, classLogPrior, featureLogProb);
  }

  get claimTypes(): readonly string[] {
    return this.classes;
  }

  /**
   * Posterior probability for every claim type, in claimTypes order
   */
  predictProbabilities(text: string): number[] {
    const vector = this.vectorizer.transform(tokenize(text));

    const jointLogLikelihood = this.classes.map((_, c) => {
      let score = this.classLogPrior[c];
      for (const [index, weight] of vector) {
        score += weight * this.featureLogProb[c][index];
      }
      return score;
    });

    // Softmax, shifted by the maximum for stability
    const max = Math.max(...jointLogLikelihood);
    const exps = jointLogLikelihood.map(score => Math.exp(score - max));
    const total = exps.reduce((sum, value) => sum + value, 0);
    return exps.map(value => value / total);
  }

  /**
   * Classify claim text. Returns a null claim type with zero confidence
   * when the text is empty or the model cannot score it.
   */
  classify(text: string | null | undefined): ClassificationResult {
    if (!text || !text.trim()) {
      log.warn('Invalid claim text for classification');
      return NOT_CLASSIFIED;
    }

    try {
      const probabilities = this.predictProbabilities(text);

      let best = 0;
      for (let c = 1; c < probabilities.length; c++) {
        if (probabilities[c] > probabilities[best]) {
          best = c;
        }
      }

      const confidence = probabilities[best];
      if (!Number.isFinite(confidence) || confidence <= 0) {
        return NOT_CLASSIFIED;
      }

      const claimType = this.classes[best];
      const priority = derivePriority(text);

      log.info(
        { claimType, priority, confidence: Number(confidence.toFixed(2)) },
        'Claim classified'
      );
      return { claimType, confidence, priority };
    } catch (error) {
      logError(log, error, 'Failed to classify claim');
      return NOT_CLASSIFIED;
    }
  }
}
