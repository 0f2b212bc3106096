import type { LinesWordsData, WordBox } from '@/types/recognizer';
import { createInvalidResultError } from '@/utils/error-handling';

export interface RecognizedWord {
  /** Offset into the flattened text where the word begins. */
  textOffset: number;
  screenX: number;
  screenY: number;
}

/**
 * Flattened recognition output. Line boundaries are logical only: lines are
 * concatenated without a separator, words within a line are joined by one space.
 */
export interface RecognitionResult {
  readonly text: string;
  /** Cumulative text length at the end of each input line. */
  readonly lineEndOffsets: readonly number[];
  readonly words: readonly Readonly<RecognizedWord>[];
  readonly originX: number;
  readonly originY: number;
}

const WORD_SEPARATOR = ' ';

export function buildLinesWordsResult(
  lines: LinesWordsData,
  originX: number,
  originY: number
): RecognitionResult {
  const parts: string[] = [];
  const lineEndOffsets: number[] = [];
  const words: Readonly<RecognizedWord>[] = [];
  let cursor = 0;

  for (const line of lines) {
    line.forEach((word, index) => {
      if (index > 0) {
        parts.push(WORD_SEPARATOR);
        cursor += WORD_SEPARATOR.length;
      }
      words.push(
        Object.freeze({
          textOffset: cursor,
          screenX: originX + word.x,
          screenY: originY + word.y,
        })
      );
      parts.push(word.text);
      cursor += word.text.length;
    });
    lineEndOffsets.push(cursor);
  }

  return Object.freeze({
    text: parts.join(''),
    lineEndOffsets: Object.freeze(lineEndOffsets),
    words: Object.freeze(words),
    originX,
    originY,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function toWordBox(value: unknown, lineIndex: number, wordIndex: number): WordBox {
  if (!isRecord(value)) {
    throw createInvalidResultError(`Word ${wordIndex} of line ${lineIndex} is not an object.`);
  }

  const { x, y, width, height, text } = value;
  if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(width) || !isFiniteNumber(height)) {
    throw createInvalidResultError(`Word ${wordIndex} of line ${lineIndex} has a malformed bounding box.`);
  }
  if (typeof text !== 'string') {
    throw createInvalidResultError(`Word ${wordIndex} of line ${lineIndex} has no text.`);
  }

  return { x, y, width, height, text };
}

/**
 * Checks a backend payload before it is flattened. Backends hand over
 * plain data that may have come from JSON or a foreign API.
 */
export function validateLinesWordsData(value: unknown): LinesWordsData {
  if (!Array.isArray(value)) {
    throw createInvalidResultError('Expected an array of lines.');
  }

  return value.map((line: unknown, lineIndex) => {
    if (!Array.isArray(line)) {
      throw createInvalidResultError(`Line ${lineIndex} is not an array of words.`);
    }
    return line.map((word: unknown, wordIndex) => toWordBox(word, lineIndex, wordIndex));
  });
}
