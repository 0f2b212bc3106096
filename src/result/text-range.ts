import type { OffsetRange, OffsetTextView, ScreenPoint } from '@/result/offset-text-view';

export type TextPosition = 'first' | 'last' | 'all' | { offset: number };

export type TextUnit = 'character' | 'word' | 'line' | 'story';

export type EndPointPair = 'startToStart' | 'startToEnd' | 'endToStart' | 'endToEnd';

/**
 * A mutable span over an {@link OffsetTextView}, used as a caret or selection
 * while reading through a result.
 */
export class TextRange {
  private readonly view: OffsetTextView;
  private startOffset: number;
  private endOffset: number;

  constructor(view: OffsetTextView, start: number, end: number) {
    this.view = view;
    this.startOffset = view.clamp(Math.min(start, end));
    this.endOffset = view.clamp(Math.max(start, end));
  }

  get start(): number {
    return this.startOffset;
  }

  get end(): number {
    return this.endOffset;
  }

  get isCollapsed(): boolean {
    return this.startOffset === this.endOffset;
  }

  get text(): string {
    return this.view.textSlice(this.startOffset, this.endOffset);
  }

  copy(): TextRange {
    return new TextRange(this.view, this.startOffset, this.endOffset);
  }

  collapse(toEnd: boolean = false): void {
    if (toEnd) {
      this.startOffset = this.endOffset;
    } else {
      this.endOffset = this.startOffset;
    }
  }

  /** Grows the range to cover the whole unit containing its start. */
  expand(unit: TextUnit): void {
    [this.startOffset, this.endOffset] = this.unitRange(unit, this.startOffset);
  }

  /**
   * Collapses to the start, then moves by `count` units (negative moves back).
   * Movement stops at either end of the text; the caret never rests on the
   * end-of-text position. Returns the signed number of units moved.
   */
  move(unit: TextUnit, count: number): number {
    let offset = this.startOffset;
    let moved = 0;

    while (moved < count) {
      const next = this.unitRange(unit, offset)[1];
      if (next <= offset || next >= this.view.storyLength) break;
      offset = next;
      moved += 1;
    }

    while (moved > count) {
      if (offset <= 0) break;
      offset = this.unitRange(unit, offset - 1)[0];
      moved -= 1;
    }

    this.startOffset = offset;
    this.endOffset = offset;
    return moved;
  }

  /** Screen position of the start of the range, for activating it. */
  point(): ScreenPoint {
    return this.view.pointAt(this.startOffset);
  }

  compareEndPoints(other: TextRange, which: EndPointPair): number {
    const [own, theirs] = this.endPoints(other, which);
    return Math.sign(own - theirs);
  }

  /** Moves one end point of this range onto an end point of `other`. */
  setEndPoint(other: TextRange, which: EndPointPair): void {
    const [, target] = this.endPoints(other, which);
    if (which.startsWith('start')) {
      this.startOffset = target;
      this.endOffset = Math.max(this.endOffset, target);
    } else {
      this.endOffset = target;
      this.startOffset = Math.min(this.startOffset, target);
    }
  }

  equals(other: TextRange): boolean {
    return (
      this.view.result === other.view.result &&
      this.startOffset === other.startOffset &&
      this.endOffset === other.endOffset
    );
  }

  private endPoints(other: TextRange, which: EndPointPair): [number, number] {
    switch (which) {
      case 'startToStart':
        return [this.startOffset, other.startOffset];
      case 'startToEnd':
        return [this.startOffset, other.endOffset];
      case 'endToStart':
        return [this.endOffset, other.startOffset];
      case 'endToEnd':
        return [this.endOffset, other.endOffset];
    }
  }

  private unitRange(unit: TextUnit, offset: number): OffsetRange {
    switch (unit) {
      case 'character':
        return offset >= this.view.storyLength
          ? [this.view.storyLength, this.view.storyLength]
          : [offset, offset + 1];
      case 'word':
        return this.view.wordRange(offset);
      case 'line':
        return this.view.lineRange(offset);
      case 'story':
        return [0, this.view.storyLength];
    }
  }
}
