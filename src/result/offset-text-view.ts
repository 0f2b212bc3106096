import type { RecognitionResult } from '@/result/lines-words-result';
import { TextRange, type TextPosition } from '@/result/text-range';
import { createEmptyResultQueryError } from '@/utils/error-handling';

export type OffsetRange = readonly [start: number, end: number];

export interface ScreenPoint {
  x: number;
  y: number;
}

/** Index of the first entry strictly greater than `offset`, or `values.length`. */
function upperBound(values: readonly number[], offset: number): number {
  let low = 0;
  let high = values.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (values[mid] > offset) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }
  return low;
}

function bracket(boundaries: readonly number[], offset: number, storyLength: number): OffsetRange {
  const index = upperBound(boundaries, offset);
  if (index < boundaries.length) {
    return [index > 0 ? boundaries[index - 1] : 0, boundaries[index]];
  }
  // Past the last boundary: clamp to the final span instead of failing.
  return [boundaries.length > 0 ? boundaries[boundaries.length - 1] : 0, storyLength];
}

/**
 * Read-only navigation over a recognition result by character offset.
 * Several views may share one result.
 */
export class OffsetTextView {
  public readonly result: RecognitionResult;
  private readonly wordOffsets: readonly number[];

  constructor(result: RecognitionResult) {
    this.result = result;
    this.wordOffsets = result.words.map((word) => word.textOffset);
  }

  get storyLength(): number {
    return this.result.text.length;
  }

  get text(): string {
    return this.result.text;
  }

  lineRange(offset: number): OffsetRange {
    return bracket(this.result.lineEndOffsets, offset, this.storyLength);
  }

  /** The returned span includes the separator that precedes the next word. */
  wordRange(offset: number): OffsetRange {
    return bracket(this.wordOffsets, offset, this.storyLength);
  }

  pointAt(offset: number): ScreenPoint {
    const { words } = this.result;
    if (words.length === 0) {
      throw createEmptyResultQueryError();
    }

    // Word 0 always starts at offset 0, so only a negative offset lands before it.
    const index = Math.max(upperBound(this.wordOffsets, offset) - 1, 0);
    const word = words[index];
    return { x: word.screenX, y: word.screenY };
  }

  textSlice(start: number, end: number): string {
    const from = this.clamp(start);
    const to = Math.max(from, this.clamp(end));
    return this.result.text.slice(from, to);
  }

  makeRange(position: TextPosition): TextRange {
    if (position === 'first') {
      return new TextRange(this, 0, 0);
    }
    if (position === 'last') {
      const last = Math.max(this.storyLength - 1, 0);
      return new TextRange(this, last, last);
    }
    if (position === 'all') {
      return new TextRange(this, 0, this.storyLength);
    }
    const offset = this.clamp(position.offset);
    return new TextRange(this, offset, offset);
  }

  clamp(offset: number): number {
    return Math.min(Math.max(Math.trunc(offset), 0), this.storyLength);
  }
}
