/**
 * A frame of screen pixels handed to a recognizer.
 * `pixels` is row-major, top to bottom, 4 bytes per pixel in B, G, R, A order.
 * The alpha byte carries no meaning and must be ignored.
 */
export interface ScreenCapture {
  pixels: Uint8Array | Uint8ClampedArray;
  /** Screen x of the capture's upper-left corner. Added to every word x. */
  left: number;
  /** Screen y of the capture's upper-left corner. Added to every word y. */
  top: number;
  width: number;
  height: number;
}

export interface WordBox {
  x: number;
  y: number;
  width: number;
  height: number;
  text: string;
}

/** Lines in reading order, each holding its words in reading order. */
export type LinesWordsData = readonly (readonly WordBox[])[];

export type RecognitionOutcome =
  | { ok: true; data: LinesWordsData }
  | { ok: false; error: unknown };

export type RecognitionCallback = (outcome: RecognitionOutcome) => void;

export interface Recognizer {
  id: string;
  /**
   * Starts recognizing `capture` and returns without blocking.
   * `onResult` fires once, asynchronously, unless the operation is cancelled first.
   */
  recognize(capture: ScreenCapture, onResult: RecognitionCallback): void;
  /** Requests that the in-flight operation stop. No-op when idle. */
  cancel(): void;
}
