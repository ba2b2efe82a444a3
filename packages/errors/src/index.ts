export { type ChainNode, foreignText, innermostNode, walkChain } from "./core/chain"
export { ChainedHttpError, type ChainedHttpErrorInit } from "./core/chained-http-error"
export { type SerializeOptions, serializeHttpError } from "./core/serialize"
export {
  configureErrors,
  DEFAULT_ERRORS_SETTINGS,
  ERRORS_ENV_PREFIX,
  type ErrorsSettings,
  errorsSettingsFromEnv,
  getErrorsSettings,
  resetErrorsSettings,
} from "./core/settings"
export {
  type CreateHttpErrorOptions,
  createHttpError,
  newError,
  newErrorf,
  wrap,
  wrapf,
} from "./core/utils/create-error"
export {
  httpResponseCodeFromError,
  isRetriableError,
  isUnretriableError,
} from "./core/utils/error-status"
export { isHttpError } from "./core/utils/is-http-error"
export { toHttpError } from "./core/utils/to-http-error"
export {
  type HttpError,
  type SerializedHttpError,
  UNINITIALIZED_ERROR_CODE,
  UNINITIALIZED_RESPONSE_CODE,
  UNINITIALIZED_STACK_TRACE,
  UNKNOWN_ERROR_MESSAGE,
} from "./ports/http-error"
export { HttpStatus } from "./ports/status-codes"
