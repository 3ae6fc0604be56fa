import { ConfigurationError, NotFoundError } from "../utils/errors.js";

/**
 * Bidirectional word <-> index vocabulary.
 *
 * Indices are handed out in first-seen order starting at 0 and never reused,
 * so a vocabulary only ever grows at the end. Vectors are comparable only when
 * they were built over the same instance (or a restored copy of it).
 * Not synchronized: one writer at a time.
 */
export class WordIndex {
  private wordToIndex = new Map<string, number>();
  private indexToWord: string[] = [];

  /**
   * Rebuilds a vocabulary from its words in index order.
   */
  static fromWords(words: Iterable<string>): WordIndex {
    const index = new WordIndex();
    for (const word of words) {
      if (index.has(word)) {
        throw new ConfigurationError(`Duplicate word "${word}" in stored vocabulary`);
      }
      index.getOrAdd(word);
    }
    return index;
  }

  /**
   * Returns the index of `word`, assigning the next free one on first sight.
   */
  getOrAdd(word: string): number {
    const existing = this.wordToIndex.get(word);
    if (existing !== undefined) {
      return existing;
    }

    const index = this.indexToWord.length;
    this.wordToIndex.set(word, index);
    this.indexToWord.push(word);
    return index;
  }

  getWord(index: number): string {
    const word = Number.isInteger(index) ? this.indexToWord[index] : undefined;
    if (word === undefined) {
      throw new NotFoundError(index);
    }
    return word;
  }

  /**
   * Lookup without insertion.
   */
  getIndex(word: string): number | undefined {
    return this.wordToIndex.get(word);
  }

  has(word: string): boolean {
    return this.wordToIndex.has(word);
  }

  /**
   * Words with index `start` and above, in index order.
   */
  wordsFrom(start: number): string[] {
    return this.indexToWord.slice(start);
  }

  get count(): number {
    return this.indexToWord.length;
  }
}
