import { DEFAULT_CHUNK_SIZE } from "../utils/config";
import { ValidationError } from "../utils/errors";

export interface WordBoundarySplitterOptions {
  /** Maximum characters per chunk */
  chunkSize: number;
}

/**
 * Splits flat text into chunks of at most `chunkSize` characters, cutting at
 * the last whitespace that fits. A word is only cut when it alone is longer
 * than the chunk size. Whitespace around each cut is dropped.
 */
export class WordBoundarySplitter {
  private readonly chunkSize: number;

  constructor(options: Partial<WordBoundarySplitterOptions> = {}) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    this.chunkSize = chunkSize;
  }

  split(content: string): string[] {
    const chunks: string[] = [];
    let remaining = content;

    while (remaining.length > 0) {
      if (remaining.length <= this.chunkSize) {
        chunks.push(remaining);
        break;
      }

      const boundary = this.findBoundary(remaining);
      const cut = boundary > 0 ? boundary : this.chunkSize;

      const chunk = remaining.slice(0, cut).trim();
      if (chunk) {
        chunks.push(chunk);
      }
      remaining = remaining.slice(cut).trim();
    }

    return chunks;
  }

  /**
   * Index of the last whitespace character at or before `chunkSize`, or -1.
   */
  private findBoundary(text: string): number {
    for (let i = Math.min(this.chunkSize, text.length - 1); i >= 0; i--) {
      if (/\s/.test(text[i])) {
        return i;
      }
    }
    return -1;
  }
}

/**
 * Splits `content` with a one-off {@link WordBoundarySplitter}.
 */
export function chunkContent(content: string, chunkSize = DEFAULT_CHUNK_SIZE): string[] {
  return new WordBoundarySplitter({ chunkSize }).split(content);
}
