import { createRequire } from 'node:module';
import path from 'node:path';
import { createWorker, type Page, type Worker, type WorkerOptions } from 'tesseract.js';
import type { LinesWordsData, RecognitionCallback, RecognitionOutcome, Recognizer, ScreenCapture, WordBox } from '@/types/recognizer';
import { resolveLogLevel } from '@/config';
import { createEngineLoadFailedError } from '@/utils/error-handling';
import { normalizeTesseractLanguage } from '@/utils/language-config';
import { createLogger, type Logger } from '@/utils/logger';
import { captureToPng } from '@/utils/screen-capture';

export type TesseractProgressCallback = (status: string, progress: number) => void;

export interface TesseractRecognizerOptions {
  language?: string;
  /** Words below this confidence (0-100) are dropped. Default: 0 */
  minConfidence?: number;
  onProgress?: TesseractProgressCallback;
  logger?: Logger;
  /**
   * Directory holding `<lang>.traineddata.gz`. Defaults to the English data
   * installed with `@tesseract.js-data/eng`; other languages need their own path.
   */
  langPath?: string;
  /** Where to cache unpacked language data. Without it nothing is written to disk. */
  cachePath?: string;
}

const ENG_DATA_VARIANT = '4.0.0_best_int';

/** Traineddata directory of the installed `@tesseract.js-data/eng` package. */
export function defaultLangPath(): string {
  const requireFromHere = createRequire(import.meta.url);
  const manifest = requireFromHere.resolve('@tesseract.js-data/eng/package.json');
  return path.join(path.dirname(manifest), ENG_DATA_VARIANT);
}

/**
 * Flattens Tesseract's block/paragraph/line hierarchy into lines of words.
 * Lines left with no words after filtering are dropped.
 */
export function pageToLinesWords(page: Page, minConfidence: number = 0): LinesWordsData {
  const lines: WordBox[][] = [];

  for (const block of page.blocks ?? []) {
    for (const paragraph of block.paragraphs) {
      for (const line of paragraph.lines) {
        const words = line.words
          .filter((word) => word.confidence >= minConfidence && word.text.trim().length > 0)
          .map((word) => ({
            x: word.bbox.x0,
            y: word.bbox.y0,
            width: word.bbox.x1 - word.bbox.x0,
            height: word.bbox.y1 - word.bbox.y0,
            text: word.text.trim(),
          }));
        if (words.length > 0) {
          lines.push(words);
        }
      }
    }
  }

  return lines;
}

export class TesseractRecognizer implements Recognizer {
  public readonly id = 'tesseract';
  public isLoading = false;
  private worker: Promise<Worker> | null = null;
  private pendingJob: number | undefined;
  private jobCounter = 0;
  private readonly language: string;
  private readonly minConfidence: number;
  private readonly onProgress?: TesseractProgressCallback;
  private readonly logger: Logger;
  private readonly langPath: string;
  private readonly cachePath?: string;

  constructor(options: TesseractRecognizerOptions = {}) {
    this.language = normalizeTesseractLanguage(options.language ?? 'eng');
    this.minConfidence = options.minConfidence ?? 0;
    this.onProgress = options.onProgress;
    this.logger = options.logger ?? createLogger('Tesseract', resolveLogLevel());
    this.langPath = options.langPath ?? defaultLangPath();
    this.cachePath = options.cachePath;
  }

  recognize(capture: ScreenCapture, onResult: RecognitionCallback): void {
    this.jobCounter += 1;
    const job = this.jobCounter;
    this.pendingJob = job;

    void this.run(capture)
      .then(
        (data) => this.deliver(job, onResult, { ok: true, data }),
        (error: unknown) => this.deliver(job, onResult, { ok: false, error })
      )
      .catch((error: unknown) => this.logger.error('result callback threw', error));
  }

  /** Tesseract cannot stop a running job; its result is discarded instead. */
  cancel(): void {
    if (this.pendingJob === undefined) {
      return;
    }
    this.logger.debug('cancelled', { job: this.pendingJob });
    this.pendingJob = undefined;
  }

  load(): Promise<Worker> {
    if (!this.worker) {
      this.worker = this.createWorker();
    }
    return this.worker;
  }

  async destroy(): Promise<void> {
    this.cancel();
    const worker = this.worker;
    this.worker = null;
    if (worker) {
      await (await worker).terminate();
    }
  }

  private async createWorker(): Promise<Worker> {
    this.isLoading = true;
    try {
      return await createWorker(this.language, 1, this.workerOptions());
    } catch (error) {
      this.worker = null;
      throw createEngineLoadFailedError(error);
    } finally {
      this.isLoading = false;
    }
  }

  private workerOptions(): Partial<WorkerOptions> {
    const options: Partial<WorkerOptions> = {
      langPath: this.langPath,
      cacheMethod: this.cachePath ? 'write' : 'none',
      logger: (message) => {
        this.onProgress?.(message.status, message.progress ?? 0);
      },
    };
    if (this.cachePath) {
      options.cachePath = this.cachePath;
    }
    return options;
  }

  private async run(capture: ScreenCapture): Promise<LinesWordsData> {
    // Await before encoding so recognize() never does pixel work on the caller's turn.
    const worker = await this.load();
    const image = captureToPng(capture);
    const result = await worker.recognize(image, {}, { blocks: true });
    return pageToLinesWords(result.data, this.minConfidence);
  }

  private deliver(job: number, onResult: RecognitionCallback, outcome: RecognitionOutcome): void {
    if (this.pendingJob !== job) {
      this.logger.debug('dropping cancelled job', { job });
      return;
    }
    this.pendingJob = undefined;
    onResult(outcome);
  }
}
