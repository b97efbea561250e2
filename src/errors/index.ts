export {
  LexNormError,
  ErrorCode,
  wrapError,
  isLexNormError,
  type ErrorContext,
} from "./LexNormError";

export { LexNormNetworkError } from "./NetworkError";
export { LexNormValidationError } from "./ValidationError";
export { LexNormExtractionError } from "./ExtractionError";
export { LexNormStorageError } from "./StorageError";
