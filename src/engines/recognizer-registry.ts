import type { Recognizer } from '@/types/recognizer';
import { createLogger, type Logger } from '@/utils/logger';

export class RecognizerRegistry {
  private readonly recognizers: Recognizer[] = [];
  private selected: Recognizer | undefined;
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('Registry')) {
    this.logger = logger;
  }

  /** The first recognizer registered becomes the selection. */
  register(recognizer: Recognizer): void {
    if (this.get(recognizer.id)) {
      throw new Error(`Recognizer already registered: ${recognizer.id}`);
    }

    this.recognizers.push(recognizer);
    this.selected ??= recognizer;
    this.logger.debug('registered', { id: recognizer.id });
  }

  select(recognizer: Recognizer | string): void {
    const id = typeof recognizer === 'string' ? recognizer : recognizer.id;
    const found = this.get(id);
    if (!found || (typeof recognizer !== 'string' && found !== recognizer)) {
      throw new Error(`Recognizer not registered: ${id}`);
    }

    this.selected = found;
    this.logger.debug('selected', { id });
  }

  current(): Recognizer | undefined {
    return this.selected;
  }

  get(id: string): Recognizer | undefined {
    return this.recognizers.find((recognizer) => recognizer.id === id);
  }

  list(): readonly Recognizer[] {
    return [...this.recognizers];
  }
}
