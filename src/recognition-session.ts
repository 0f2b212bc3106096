import type { RecognizerRegistry } from '@/engines/recognizer-registry';
import { buildLinesWordsResult, validateLinesWordsData, type RecognitionResult } from '@/result/lines-words-result';
import { OffsetTextView } from '@/result/offset-text-view';
import type { RecognitionError } from '@/types/recognition-errors';
import type { RecognitionOutcome, Recognizer, ScreenCapture } from '@/types/recognizer';
import { resolveLogLevel } from '@/config';
import {
  createCancelledError,
  createNoRecognizerError,
  createSessionDisposedError,
  toRecognitionFailure,
} from '@/utils/error-handling';
import { createLogger, type Logger } from '@/utils/logger';

export interface SucceededRecognition {
  status: 'succeeded';
  generation: number;
  result: RecognitionResult;
  view: OffsetTextView;
}

export interface FailedRecognition {
  status: 'failed';
  generation: number;
  error: RecognitionError;
}

export type RecognitionCompletion = SucceededRecognition | FailedRecognition;

export type CompletionHandler = (completion: RecognitionCompletion) => void;

export interface RecognitionSessionOptions {
  logger?: Logger;
  /** Check backend payloads before building a result. Default: true */
  validateResults?: boolean;
}

interface ActiveRecognition {
  generation: number;
  recognizer: Recognizer;
  /** Capture origin, copied when the recognition starts. */
  originX: number;
  originY: number;
  onComplete: CompletionHandler;
  onAbandon?: () => void;
}

/**
 * Runs at most one recognition at a time. Starting a new one cancels the
 * previous one; completions are matched against a generation counter and
 * anything that does not belong to the current generation is dropped.
 */
export class RecognitionSession {
  private readonly registry: RecognizerRegistry;
  private readonly options: Required<RecognitionSessionOptions>;
  private active: ActiveRecognition | undefined;
  private currentGeneration = 0;
  private disposed = false;

  constructor(registry: RecognizerRegistry, options: RecognitionSessionOptions = {}) {
    this.registry = registry;
    this.options = {
      logger: options.logger ?? createLogger('Session', resolveLogLevel()),
      validateResults: options.validateResults ?? true,
    };
  }

  get isActive(): boolean {
    return this.active !== undefined;
  }

  get activeRecognizer(): Recognizer | undefined {
    return this.active?.recognizer;
  }

  get generation(): number {
    return this.currentGeneration;
  }

  /**
   * Starts recognizing `capture` with `recognizer`, or the registry's current
   * selection. Throws synchronously when there is nothing to recognize with;
   * every other failure arrives through `onComplete`.
   * Returns the generation assigned to this recognition.
   */
  start(
    capture: ScreenCapture,
    onComplete: CompletionHandler,
    recognizer: Recognizer | undefined = this.registry.current()
  ): number {
    return this.begin(capture, recognizer, onComplete);
  }

  /**
   * Promise form of {@link start}. Rejects with RECOGNITION_CANCELLED if the
   * recognition is cancelled or superseded before it completes.
   */
  recognize(
    capture: ScreenCapture,
    recognizer: Recognizer | undefined = this.registry.current()
  ): Promise<SucceededRecognition> {
    return new Promise<SucceededRecognition>((resolve, reject) => {
      this.begin(
        capture,
        recognizer,
        (completion) => {
          if (completion.status === 'succeeded') {
            resolve(completion);
          } else {
            reject(completion.error);
          }
        },
        () => reject(createCancelledError())
      );
    });
  }

  /** No-op when idle. */
  cancel(): void {
    if (!this.active) {
      return;
    }
    this.options.logger.debug('cancelling', { generation: this.active.generation });
    this.supersede();
  }

  dispose(): void {
    this.cancel();
    this.disposed = true;
  }

  private begin(
    capture: ScreenCapture,
    recognizer: Recognizer | undefined,
    onComplete: CompletionHandler,
    onAbandon?: () => void
  ): number {
    if (this.disposed) {
      throw createSessionDisposedError();
    }
    if (!recognizer) {
      throw createNoRecognizerError();
    }

    this.supersede();

    this.currentGeneration += 1;
    const generation = this.currentGeneration;
    this.active = {
      generation,
      recognizer,
      originX: capture.left,
      originY: capture.top,
      onComplete,
      onAbandon,
    };
    this.options.logger.debug('recognizing', { generation, recognizer: recognizer.id });

    try {
      recognizer.recognize(capture, (outcome) => this.handleOutcome(generation, outcome));
    } catch (error) {
      queueMicrotask(() => this.handleOutcome(generation, { ok: false, error }));
    }

    return generation;
  }

  private supersede(): void {
    const previous = this.active;
    if (!previous) {
      return;
    }

    this.active = undefined;
    try {
      previous.recognizer.cancel();
    } catch (error) {
      this.options.logger.error(`cancel failed for ${previous.recognizer.id}`, error);
    }
    previous.onAbandon?.();
  }

  private handleOutcome(generation: number, outcome: RecognitionOutcome): void {
    const active = this.active;
    if (!active || active.generation !== generation) {
      this.options.logger.debug('dropping stale completion', { generation });
      return;
    }

    this.active = undefined;
    const completion = this.settle(active, outcome);
    try {
      active.onComplete(completion);
    } catch (error) {
      this.options.logger.error('completion handler threw', error);
    }
  }

  private settle(active: ActiveRecognition, outcome: RecognitionOutcome): RecognitionCompletion {
    const { generation, originX, originY } = active;
    let failure: unknown;

    if (outcome.ok) {
      try {
        const data = this.options.validateResults ? validateLinesWordsData(outcome.data) : outcome.data;
        const result = buildLinesWordsResult(data, originX, originY);
        this.options.logger.info('recognition complete', {
          generation,
          words: result.words.length,
          lines: result.lineEndOffsets.length,
        });
        return { status: 'succeeded', generation, result, view: new OffsetTextView(result) };
      } catch (error) {
        failure = error;
      }
    } else {
      failure = outcome.error;
    }

    this.options.logger.error(`recognition failed (generation ${generation})`, failure);
    return { status: 'failed', generation, error: toRecognitionFailure(failure) };
  }
}
