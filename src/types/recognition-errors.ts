export enum RecognitionErrorCode {
  NO_RECOGNIZER_AVAILABLE = 'NO_RECOGNIZER_AVAILABLE',
  RECOGNITION_FAILED = 'RECOGNITION_FAILED',
  RECOGNITION_CANCELLED = 'RECOGNITION_CANCELLED',
  EMPTY_RESULT_QUERY = 'EMPTY_RESULT_QUERY',
  INVALID_IMAGE = 'INVALID_IMAGE',
  INVALID_RESULT = 'INVALID_RESULT',
  ENGINE_LOAD_FAILED = 'ENGINE_LOAD_FAILED',
  SESSION_DISPOSED = 'SESSION_DISPOSED',
}

export interface ErrorMessage {
  code: RecognitionErrorCode;
  message: string;
  recoverySuggestion?: string;
}

export class RecognitionError extends Error {
  public readonly code: RecognitionErrorCode;
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: RecognitionErrorCode,
    recoverable: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RecognitionError';
    this.code = code;
    this.recoverable = recoverable;
  }
}
