/**
 * Form configuration
 *
 * A FormConfig is the snapshot of one form's context: where it posts, the
 * CSRF token to embed, the bound model, the previous submission and the
 * validation messages. `normalizeFormConfig` fills the defaults and copies
 * every collection so the builder never shares state with the caller.
 */

import { csrfFieldSetting, getLogger } from '../settings.js';
import type { Logger } from '../shared/logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Property name -> form field name, the form-binding tags of a model. */
export type FieldBindings = Readonly<Record<string, string>>;

/**
 * Looks up a field that is not a top-level property of the model, such as a
 * dotted path. `undefined` means not found.
 */
export type PathResolver = (model: object, name: string) => unknown;

/** Previous submission, as parsed by the host framework. */
export type OldInputSource =
  | URLSearchParams
  | ReadonlyMap<string, readonly string[]>
  | Readonly<Record<string, string | readonly string[] | undefined>>;

export type ErrorSource = ReadonlyMap<string, string> | Readonly<Record<string, string | undefined>>;

export interface FormConfig {
  action?: string;
  method?: HttpMethod | string;
  csrfToken?: string;
  csrfField?: string;
  model?: object | null;
  bindings?: FieldBindings;
  pathResolver?: PathResolver;
  oldInput?: OldInputSource;
  errors?: ErrorSource;
  multipart?: boolean;
  logger?: Logger;
}

export interface ResolvedFormConfig {
  readonly action: string;
  readonly method: string;
  readonly csrfToken: string;
  readonly csrfField: string;
  readonly model: object | null;
  readonly bindings: FieldBindings;
  readonly pathResolver?: PathResolver;
  readonly oldInput: ReadonlyMap<string, readonly string[]>;
  readonly errors: ReadonlyMap<string, string>;
  readonly multipart: boolean;
  readonly logger: Logger;
}

function isMapLike<V>(source: object): source is ReadonlyMap<string, V> {
  return source instanceof Map;
}

export function normalizeOldInput(source?: OldInputSource): Map<string, readonly string[]> {
  const values = new Map<string, readonly string[]>();
  if (!source) {
    return values;
  }

  if (source instanceof URLSearchParams) {
    for (const key of new Set(source.keys())) {
      values.set(key, Object.freeze(source.getAll(key)));
    }
    return values;
  }

  if (isMapLike<readonly string[]>(source)) {
    for (const [key, list] of source) {
      values.set(key, Object.freeze([...list]));
    }
    return values;
  }

  for (const [key, entry] of Object.entries(source)) {
    if (entry === undefined) continue;
    values.set(key, Object.freeze(typeof entry === 'string' ? [entry] : [...entry]));
  }
  return values;
}

export function normalizeErrors(source?: ErrorSource): Map<string, string> {
  const errors = new Map<string, string>();
  if (!source) {
    return errors;
  }
  const entries: Array<[string, string | undefined]> = isMapLike<string>(source)
    ? [...source.entries()]
    : Object.entries(source);
  for (const [key, message] of entries) {
    if (message) {
      errors.set(key, message);
    }
  }
  return errors;
}

export function normalizeFormConfig(config: FormConfig = {}): ResolvedFormConfig {
  return Object.freeze({
    action: config.action ?? '',
    method: (config.method ?? '').trim().toUpperCase(),
    csrfToken: config.csrfToken ?? '',
    csrfField: config.csrfField || csrfFieldSetting(),
    model: config.model ?? null,
    bindings: Object.freeze({ ...config.bindings }),
    pathResolver: config.pathResolver,
    oldInput: normalizeOldInput(config.oldInput),
    errors: normalizeErrors(config.errors),
    multipart: config.multipart === true,
    logger: config.logger ?? getLogger(),
  });
}

/**
 * Method the browser actually uses. Anything but GET travels as POST.
 */
export function transportMethod(method: string): string {
  if (method === '') return '';
  return method === 'GET' ? 'GET' : 'POST';
}

/**
 * Method to announce through the `_method` field, if any.
 */
export function spoofedMethod(method: string): string | undefined {
  if (method === '' || method === 'GET' || method === 'POST') return undefined;
  return method;
}
