const WORD_CHAR = '[\\p{L}\\p{N}_]';
const WORD_CHAR_TEST = new RegExp(`^${WORD_CHAR}$`, 'u');

interface Hit {
  index: number;
  order: number;
  word: string;
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isWordChar(ch: string): boolean {
  return WORD_CHAR_TEST.test(ch);
}

/**
 * Whole-word pattern with `\b` semantics over Unicode letters and digits.
 * A side that starts or ends on punctuation needs a word character next to it,
 * exactly like `\b` would.
 */
function buildPattern(word: string): RegExp {
  const chars = Array.from(word);
  const lead = isWordChar(chars[0]) ? `(?<!${WORD_CHAR})` : `(?<=${WORD_CHAR})`;
  const trail = isWordChar(chars[chars.length - 1]) ? `(?!${WORD_CHAR})` : `(?=${WORD_CHAR})`;
  return new RegExp(`${lead}${escapeRegex(word)}${trail}`, 'gu');
}

/**
 * Finds configured filler words in free text.
 *
 * Every word is scanned on its own, so overlapping targets ("you know" and
 * "know") are both counted, then the hits are merged into the order they
 * appear in the text.
 */
export class FillerDetector {
  readonly words: readonly string[];
  private readonly patterns: ReadonlyArray<{ word: string; pattern: RegExp }>;

  constructor(fillerWords: string[]) {
    this.words = fillerWords.map(w => w.toLowerCase().trim()).filter(w => w.length > 0);
    this.patterns = this.words.map(word => ({ word, pattern: buildPattern(word) }));
  }

  detect(text: string): string[] {
    if (!text || this.patterns.length === 0) {
      return [];
    }

    const lower = text.toLowerCase();
    const hits: Hit[] = [];

    this.patterns.forEach(({ word, pattern }, order) => {
      for (const match of lower.matchAll(pattern)) {
        hits.push({ index: match.index ?? 0, order, word });
      }
    });

    return hits
      .sort((a, b) => a.index - b.index || a.order - b.order)
      .map(hit => hit.word);
  }

  count(text: string): number {
    return this.detect(text).length;
  }

  /**
   * Per-word counts for a single text, keyed in order of first appearance.
   */
  breakdown(text: string): Map<string, number> {
    const counts = new Map<string, number>();
    for (const word of this.detect(text)) {
      counts.set(word, (counts.get(word) || 0) + 1);
    }
    return counts;
  }
}
