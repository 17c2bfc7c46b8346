export const DEFAULT_HISTORY_SIZE = 10;

/**
 * The most recently generated source sentences, oldest first.
 */
export class SentenceHistory {
  private readonly sentences: string[] = [];

  constructor(private readonly capacity: number = DEFAULT_HISTORY_SIZE) {}

  add(sentence: string): void {
    this.sentences.push(sentence);
    while (this.sentences.length > this.capacity) {
      this.sentences.shift();
    }
  }

  snapshot(): readonly string[] {
    return Object.freeze([...this.sentences]);
  }

  get size(): number {
    return this.sentences.length;
  }

  clear(): void {
    this.sentences.length = 0;
  }
}
