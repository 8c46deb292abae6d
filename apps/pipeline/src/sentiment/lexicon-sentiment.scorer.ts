import { Inject, Injectable, Optional } from '@nestjs/common';
import Sentiment from 'sentiment';
import modifiers from './data/sentiment-modifiers.json';
import {
  SentimentScore,
  SentimentScorer,
  labelForScore,
} from './sentiment-scorer.interface';

/**
 * Minimal surface of the AFINN analyzer used for word valences
 */
export interface AfinnAnalyzer {
  analyze(phrase: string): { score: number };
}

/**
 * Injection token for AFINN sentiment analyzer (used for testing)
 */
export const AFINN_ANALYZER = 'AFINN_ANALYZER';

const BOOSTERS = new Set(modifiers.boosters);
const DAMPENERS = new Set(modifiers.dampeners);
const NEGATORS = new Set(modifiers.negators);

/**
 * Lexicon-and-rule sentiment scorer
 *
 * Word valences come from AFINN-165. On top of the raw sum:
 * - degree modifiers up to three words back nudge a valence up or down,
 *   less the further away they are
 * - a negator up to three words back flips and dampens the valence
 * - "but" halves everything before it and boosts everything after it
 * - "!" and repeated "?" push the sum further in its own direction
 *
 * The sum is squashed into [-1, 1] as sum / sqrt(sum^2 + alpha).
 */
@Injectable()
export class LexiconSentimentScorer implements SentimentScorer {
  private static readonly WINDOW = 3;
  private static readonly DISTANCE_DECAY = [1, 0.95, 0.9];
  private static readonly MODIFIER_INCREMENT = 0.293;
  private static readonly NEGATION_SCALAR = -0.74;
  private static readonly BEFORE_BUT = 0.5;
  private static readonly AFTER_BUT = 1.5;
  private static readonly EXCLAMATION_WEIGHT = 0.292;
  private static readonly MAX_EXCLAMATIONS = 4;
  private static readonly QUESTION_WEIGHT = 0.18;
  private static readonly MAX_QUESTION_EMPHASIS = 0.96;
  private static readonly ALPHA = 15;

  private readonly analyzer: AfinnAnalyzer;
  private readonly valenceCache = new Map<string, number>();

  constructor(
    @Optional()
    @Inject(AFINN_ANALYZER)
    analyzer?: AfinnAnalyzer,
  ) {
    this.analyzer = analyzer ?? new Sentiment();
  }

  score(text: string): SentimentScore {
    if (typeof text !== 'string' || text.trim().length === 0) {
      return { score: 0, label: labelForScore(0) };
    }

    const words = this.tokenize(text);
    const valences = words.map((word, index) => this.wordValence(words, index));

    const butIndex = words.indexOf('but');
    if (butIndex >= 0) {
      for (let i = 0; i < valences.length; i++) {
        if (i < butIndex) valences[i] *= LexiconSentimentScorer.BEFORE_BUT;
        else if (i > butIndex) valences[i] *= LexiconSentimentScorer.AFTER_BUT;
      }
    }

    let sum = valences.reduce((total, value) => total + value, 0);
    const emphasis = this.punctuationEmphasis(text);
    if (sum > 0) sum += emphasis;
    else if (sum < 0) sum -= emphasis;

    const compound = this.normalize(sum);
    return { score: compound, label: labelForScore(compound) };
  }

  /**
   * Whitespace tokens with surrounding punctuation removed.
   * Inner apostrophes survive so contractions can be recognized.
   */
  private tokenize(text: string): string[] {
    return text
      .toLowerCase()
      .split(/\s+/)
      .map((token) => token.replace(/^[^\p{L}\p{N}']+|[^\p{L}\p{N}']+$/gu, ''))
      .map((token) => token.replace(/^'+|'+$/g, ''))
      .filter((token) => token.length > 0);
  }

  private wordValence(words: readonly string[], index: number): number {
    const word = words[index];
    if (this.isModifier(word) || this.isNegator(word)) {
      return 0;
    }

    let valence = this.lexiconValence(word);
    if (valence === 0) {
      return 0;
    }

    let negated = false;
    for (let distance = 1; distance <= LexiconSentimentScorer.WINDOW; distance++) {
      const previous = words[index - distance];
      if (previous === undefined) break;

      const increment = this.modifierIncrement(previous);
      if (increment !== 0) {
        const decay = LexiconSentimentScorer.DISTANCE_DECAY[distance - 1];
        valence += Math.sign(valence) * increment * decay;
      }
      if (this.isNegator(previous)) {
        negated = true;
      }
    }

    return negated ? valence * LexiconSentimentScorer.NEGATION_SCALAR : valence;
  }

  private lexiconValence(word: string): number {
    const cached = this.valenceCache.get(word);
    if (cached !== undefined) {
      return cached;
    }
    const valence = this.analyzer.analyze(word).score;
    this.valenceCache.set(word, valence);
    return valence;
  }

  private modifierIncrement(word: string): number {
    if (BOOSTERS.has(word)) return LexiconSentimentScorer.MODIFIER_INCREMENT;
    if (DAMPENERS.has(word)) return -LexiconSentimentScorer.MODIFIER_INCREMENT;
    return 0;
  }

  private isModifier(word: string): boolean {
    return BOOSTERS.has(word) || DAMPENERS.has(word);
  }

  private isNegator(word: string): boolean {
    return NEGATORS.has(word.replace(/'/g, '')) || word.endsWith("n't");
  }

  private punctuationEmphasis(text: string): number {
    const exclamations = Math.min(
      (text.match(/!/g) ?? []).length,
      LexiconSentimentScorer.MAX_EXCLAMATIONS,
    );
    const questions = (text.match(/\?/g) ?? []).length;
    const questionEmphasis =
      questions > 1
        ? Math.min(
            questions * LexiconSentimentScorer.QUESTION_WEIGHT,
            LexiconSentimentScorer.MAX_QUESTION_EMPHASIS,
          )
        : 0;

    return (
      exclamations * LexiconSentimentScorer.EXCLAMATION_WEIGHT +
      questionEmphasis
    );
  }

  private normalize(sum: number): number {
    const compound = sum / Math.sqrt(sum * sum + LexiconSentimentScorer.ALPHA);
    const clamped = Math.max(-1, Math.min(1, compound));
    // Avoid reporting -0 for fully cancelled texts
    return Math.round(clamped * 10000) / 10000 || 0;
  }
}
