import { WordList } from "@core";

/** Whitespace tokens, literal. Case and punctuation are left to consumers. */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export class WordListAccumulator {
  private readonly words: string[] = [];
  private consumed = 0;

  constructor(readonly maxItems: number) {}

  get items() {
    return this.consumed;
  }

  get wordCount() {
    return this.words.length;
  }

  get full() {
    return this.consumed >= this.maxItems;
  }

  add(text: string) {
    this.consumed++;
    for (const w of splitWords(text)) this.words.push(w);
  }

  result(partial = false): WordList {
    return { words: [...this.words], items: this.consumed, partial };
  }
}
