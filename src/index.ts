export type {
  LinesWordsData,
  RecognitionCallback,
  RecognitionOutcome,
  Recognizer,
  ScreenCapture,
  WordBox,
} from '@/types/recognizer';
export { RecognitionError, RecognitionErrorCode, type ErrorMessage } from '@/types/recognition-errors';
export {
  buildLinesWordsResult,
  validateLinesWordsData,
  type RecognitionResult,
  type RecognizedWord,
} from '@/result/lines-words-result';
export { OffsetTextView, type OffsetRange, type ScreenPoint } from '@/result/offset-text-view';
export { TextRange, type EndPointPair, type TextPosition, type TextUnit } from '@/result/text-range';
export {
  RecognitionSession,
  type CompletionHandler,
  type FailedRecognition,
  type RecognitionCompletion,
  type RecognitionSessionOptions,
  type SucceededRecognition,
} from '@/recognition-session';
export { RecognizerRegistry } from '@/engines/recognizer-registry';
export {
  TesseractRecognizer,
  defaultLangPath,
  pageToLinesWords,
  type TesseractProgressCallback,
  type TesseractRecognizerOptions,
} from '@/engines/tesseract-recognizer';
export { ERROR_MESSAGES, formatErrorMessage, toRecognitionFailure } from '@/utils/error-handling';
export { createLogger, type LogLevel, type Logger } from '@/utils/logger';
export { resolveLogLevel } from '@/config';
export { normalizeTesseractLanguage, TESSERACT_LANGUAGES } from '@/utils/language-config';
