import { RecognitionError, RecognitionErrorCode, type ErrorMessage } from '@/types/recognition-errors';

export const ERROR_MESSAGES: Record<RecognitionErrorCode, ErrorMessage> = {
  [RecognitionErrorCode.NO_RECOGNIZER_AVAILABLE]: {
    code: RecognitionErrorCode.NO_RECOGNIZER_AVAILABLE,
    message: 'No content recognizers available.',
    recoverySuggestion: 'Register a recognizer before starting recognition.',
  },
  [RecognitionErrorCode.RECOGNITION_FAILED]: {
    code: RecognitionErrorCode.RECOGNITION_FAILED,
    message: 'Recognition failed.',
    recoverySuggestion: 'Retry, or select a different recognizer.',
  },
  [RecognitionErrorCode.RECOGNITION_CANCELLED]: {
    code: RecognitionErrorCode.RECOGNITION_CANCELLED,
    message: 'Recognition was cancelled.',
    recoverySuggestion: 'Start a new recognition if the result is still needed.',
  },
  [RecognitionErrorCode.EMPTY_RESULT_QUERY]: {
    code: RecognitionErrorCode.EMPTY_RESULT_QUERY,
    message: 'The recognition result contains no words.',
    recoverySuggestion: 'Check that the result has words before asking for a screen point.',
  },
  [RecognitionErrorCode.INVALID_IMAGE]: {
    code: RecognitionErrorCode.INVALID_IMAGE,
    message: 'Invalid screen capture.',
    recoverySuggestion: 'Supply BGRA pixels matching the declared width and height.',
  },
  [RecognitionErrorCode.INVALID_RESULT]: {
    code: RecognitionErrorCode.INVALID_RESULT,
    message: 'The recognizer returned malformed lines and words.',
    recoverySuggestion: 'Check the recognizer backend output format.',
  },
  [RecognitionErrorCode.ENGINE_LOAD_FAILED]: {
    code: RecognitionErrorCode.ENGINE_LOAD_FAILED,
    message: 'Failed to load the recognition engine.',
    recoverySuggestion: 'Check that the language data can be loaded and try again.',
  },
  [RecognitionErrorCode.SESSION_DISPOSED]: {
    code: RecognitionErrorCode.SESSION_DISPOSED,
    message: 'The recognition session has been disposed.',
    recoverySuggestion: 'Create a new session.',
  },
};

export function formatErrorMessage(error: unknown): ErrorMessage {
  const failed = ERROR_MESSAGES[RecognitionErrorCode.RECOGNITION_FAILED];

  if (error instanceof RecognitionError) {
    const fallback = ERROR_MESSAGES[error.code];
    return {
      code: error.code,
      message: error.message || fallback.message,
      recoverySuggestion: fallback.recoverySuggestion,
    };
  }

  if (error instanceof Error) {
    return {
      code: RecognitionErrorCode.RECOGNITION_FAILED,
      message: error.message || failed.message,
      recoverySuggestion: failed.recoverySuggestion,
    };
  }

  return {
    code: RecognitionErrorCode.RECOGNITION_FAILED,
    message: failed.message,
    recoverySuggestion: failed.recoverySuggestion,
  };
}

function createError(code: RecognitionErrorCode, recoverable: boolean, message?: string, cause?: unknown): RecognitionError {
  return new RecognitionError(
    message ?? ERROR_MESSAGES[code].message,
    code,
    recoverable,
    cause === undefined ? undefined : { cause }
  );
}

export function createNoRecognizerError(): RecognitionError {
  return createError(RecognitionErrorCode.NO_RECOGNIZER_AVAILABLE, false);
}

export function createRecognitionFailedError(cause?: unknown): RecognitionError {
  return createError(RecognitionErrorCode.RECOGNITION_FAILED, true, undefined, cause);
}

export function createCancelledError(): RecognitionError {
  return createError(RecognitionErrorCode.RECOGNITION_CANCELLED, true);
}

export function createEmptyResultQueryError(): RecognitionError {
  return createError(RecognitionErrorCode.EMPTY_RESULT_QUERY, false);
}

export function createInvalidImageError(message?: string): RecognitionError {
  return createError(RecognitionErrorCode.INVALID_IMAGE, false, message);
}

export function createInvalidResultError(message?: string): RecognitionError {
  return createError(RecognitionErrorCode.INVALID_RESULT, true, message);
}

export function createEngineLoadFailedError(cause?: unknown): RecognitionError {
  return createError(RecognitionErrorCode.ENGINE_LOAD_FAILED, true, undefined, cause);
}

export function createSessionDisposedError(): RecognitionError {
  return createError(RecognitionErrorCode.SESSION_DISPOSED, false);
}

/**
 * Collapses any backend failure into a single RECOGNITION_FAILED error.
 * The original value is kept as `cause` for logging.
 */
export function toRecognitionFailure(error: unknown): RecognitionError {
  if (error instanceof RecognitionError && error.code === RecognitionErrorCode.RECOGNITION_FAILED) {
    return error;
  }
  return createRecognitionFailedError(error);
}
