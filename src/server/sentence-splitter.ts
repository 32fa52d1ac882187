/**
 * Sentence Splitter
 * Cuts streamed text into sentences as soon as a boundary arrives.
 */

/** Terminal punctuation followed by a space, a closing quote or a newline */
const SENTENCE_ENDINGS = ['. ', '! ', '? ', '."', '!"', '?"', '.\n', '!\n', '?\n'];

export class SentenceSplitter {
  private buffer = '';

  /** Add streamed text; returns every sentence it completed */
  push(text: string): string[] {
    this.buffer += text;
    const sentences: string[] = [];

    for (;;) {
      let index = -1;
      let ending = '';
      for (const candidate of SENTENCE_ENDINGS) {
        const at = this.buffer.indexOf(candidate);
        if (at !== -1 && (index === -1 || at < index)) {
          index = at;
          ending = candidate;
        }
      }
      if (index === -1) break;

      const sentence = (this.buffer.slice(0, index) + ending.trim()).trim();
      this.buffer = this.buffer.slice(index + ending.length);
      if (sentence) sentences.push(sentence);
    }

    return sentences;
  }

  /** Whatever is left once the stream ends, or null */
  flush(): string | null {
    const rest = this.buffer.trim();
    this.buffer = '';
    return rest || null;
  }
}
