import type { RecognitionOutcome, Recognizer, RecognitionCallback, ScreenCapture } from '../src/types/recognizer';

/** Runs `fn` and returns what it threw, or undefined. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

export function makeCapture(left: number = 0, top: number = 0, width: number = 2, height: number = 2): ScreenCapture {
  return { pixels: new Uint8Array(width * height * 4), left, top, width, height };
}

/**
 * In-process recognizer whose completions are triggered by the test.
 * Every call is recorded in `calls`, shared across instances when passed in.
 */
export class FakeRecognizer implements Recognizer {
  public readonly pending: RecognitionCallback[] = [];
  public readonly captures: ScreenCapture[] = [];

  constructor(
    public readonly id: string,
    private readonly calls: string[] = []
  ) {}

  recognize(capture: ScreenCapture, onResult: RecognitionCallback): void {
    this.calls.push(`recognize:${this.id}`);
    this.captures.push(capture);
    this.pending.push(onResult);
  }

  cancel(): void {
    this.calls.push(`cancel:${this.id}`);
  }

  /** Fires the callback of the `index`-th recognize call. */
  complete(outcome: RecognitionOutcome, index: number = this.pending.length - 1): void {
    const callback = this.pending[index];
    if (!callback) {
      throw new Error(`No recognize call #${index} on ${this.id}`);
    }
    callback(outcome);
  }
}
