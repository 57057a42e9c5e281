/**
 * formsmith
 *
 * Server-side HTML form helpers: value repopulation from old input and bound
 * models, inline validation errors, CSRF tokens and method spoofing
 */

// Form builder
export { FormBuilder, createFormBuilder, METHOD_FIELD, type InputType, type SelectOption } from './form/builder.js';
export {
  normalizeFormConfig,
  transportMethod,
  spoofedMethod,
  type FormConfig,
  type ResolvedFormConfig,
  type HttpMethod,
  type FieldBindings,
  type PathResolver,
  type OldInputSource,
  type ErrorSource,
} from './form/config.js';
export {
  mergeAttributes,
  unionClasses,
  INVALID_CLASS,
  type Attributes,
  type AttributeValue,
  type AttributeEntry,
  type MergeOptions,
} from './form/attributes.js';
export { SafeHtml, EMPTY_HTML, isSafeHtml, concatHtml } from './form/html.js';
export {
  ValueResolver,
  dottedPathResolver,
  type FieldValue,
  type ResolvedValue,
  type ValueSource,
} from './form/values.js';

// Validation
export { defineForm, FormDefinition, type FieldDefinition, type FormFields } from './validation/definition.js';
export { FormValidator, validate, getValidator, type ValidationOutcome } from './validation/validator.js';
export { parseRuleTag, type Rule, type RuleName } from './validation/rules.js';

// CSRF
export { CsrfProtection, type CsrfOptions, type CsrfFormConfig } from './csrf/protection.js';
export { MemoryTokenStore, type TokenStore, type MemoryTokenStoreOptions } from './csrf/store.js';

// Ambient
export {
  loadSettings,
  loadLogSettings,
  loadCsrfSettings,
  csrfFieldSetting,
  getLogger,
  DEFAULT_CSRF_FIELD,
  type Settings,
  type LogSettings,
  type CsrfSettings,
} from './settings.js';
export { Logger, createLogger, normalizeLogLevel, type LogLevel, type LoggerOptions, type LogRecord } from './shared/logger.js';
export {
  FormsmithError,
  ValidationError,
  ConfigurationError,
  DocumentError,
  getErrorMessage,
  formatErrorMessage,
  isErrorCode,
} from './shared/error-handler.js';
export { escapeHtml } from './shared/security.js';
