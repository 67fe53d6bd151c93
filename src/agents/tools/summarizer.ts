/**
 * Extractive article summaries.
 *
 * Sentence splitting is an optional, process-wide capability: it is provisioned
 * on first use, and when it cannot be provisioned articles are simply stored
 * without a summary.
 */

import { logger, errorMessage } from '../../utils/logger';

export type SentenceSplitter = (text: string) => string[];
export type SplitterProvisioner = (locale: string) => SentenceSplitter;

const SUMMARY_SENTENCES = 5;
const MIN_KEYWORD_LENGTH = 3;

export const provisionIntlSplitter: SplitterProvisioner = (locale) => {
  const [supported] = Intl.Segmenter.supportedLocalesOf([locale]);
  const segmenter = new Intl.Segmenter(supported ?? 'en', { granularity: 'sentence' });
  return (text) =>
    Array.from(segmenter.segment(text), ({ segment }) => segment.trim()).filter(Boolean);
};

export class SentenceTokenizer {
  // undefined until the first provisioning attempt; null when it failed
  private splitter: SentenceSplitter | null | undefined;

  constructor(
    private readonly locale: string,
    private readonly provision: SplitterProvisioner = provisionIntlSplitter
  ) {}

  /**
   * Provision the splitter once; later calls return the cached result
   */
  ensureAvailable(): boolean {
    if (this.splitter === undefined) {
      try {
        logger.debug(`Provisioning sentence tokenizer (${this.locale})`);
        this.splitter = this.provision(this.locale);
      } catch (error) {
        logger.warn(`Sentence tokenizer not available: ${errorMessage(error)}`);
        this.splitter = null;
      }
    }
    return this.splitter !== null;
  }

  split(text: string): string[] {
    if (!this.ensureAvailable() || !this.splitter) {
      throw new Error('Sentence tokenizer is not available');
    }
    return this.splitter(text);
  }
}

const sharedTokenizers = new Map<string, SentenceTokenizer>();

/**
 * Process-wide tokenizer for `locale`, created on first request
 */
export function getSentenceTokenizer(locale = 'en'): SentenceTokenizer {
  let tokenizer = sharedTokenizers.get(locale);
  if (!tokenizer) {
    tokenizer = new SentenceTokenizer(locale);
    sharedTokenizers.set(locale, tokenizer);
  }
  return tokenizer;
}

function tokenizeWords(text: string): string[] {
  return (text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []).filter(word => word.length >= MIN_KEYWORD_LENGTH);
}

/**
 * Pick the sentences that carry the article's most frequent keywords,
 * returned in their original order. Title words weigh double.
 */
export function summarize(
  title: string,
  text: string,
  tokenizer: SentenceTokenizer,
  maxSentences = SUMMARY_SENTENCES
): string | null {
  if (!text.trim() || !tokenizer.ensureAvailable()) {
    return null;
  }

  const sentences = tokenizer.split(text);
  if (sentences.length === 0) {
    return null;
  }
  if (sentences.length <= maxSentences) {
    return sentences.join(' ');
  }

  const frequencies = new Map<string, number>();
  for (const word of tokenizeWords(text)) {
    frequencies.set(word, (frequencies.get(word) ?? 0) + 1);
  }
  const titleWords = new Set(tokenizeWords(title));

  const scored = sentences.map((sentence, index) => {
    const words = tokenizeWords(sentence);
    const total = words.reduce(
      (sum, word) => sum + (frequencies.get(word) ?? 0) * (titleWords.has(word) ? 2 : 1),
      0
    );
    return { index, sentence, score: words.length ? total / words.length : 0 };
  });

  return scored
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, maxSentences)
    .sort((a, b) => a.index - b.index)
    .map(item => item.sentence)
    .join(' ');
}
