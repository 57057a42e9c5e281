/**
 * Value resolution
 *
 * The value a control renders comes from exactly one place, first hit wins:
 *   1. old input (the previous submission)
 *   2. the bound model, by form-binding name
 *   3. the explicit default given to the control
 *   4. the empty string
 */

import type { FieldBindings, PathResolver, ResolvedFormConfig } from './config.js';

/**
 * Booleans are kept as booleans so checkbox and radio controls can match
 * them against their declared value.
 */
export type FieldValue = string | readonly string[] | boolean;

export type ValueSource = 'old' | 'model' | 'default' | 'empty';

export interface ResolvedValue {
  readonly source: ValueSource;
  readonly value: FieldValue;
}

function scalarToString(raw: unknown): string | undefined {
  switch (typeof raw) {
    case 'string':
      return raw;
    case 'number':
      return Number.isFinite(raw) ? String(raw) : '';
    case 'bigint':
      return String(raw);
    case 'boolean':
      return raw ? 'true' : 'false';
    default:
      return undefined;
  }
}

/**
 * Converts a model property to a field value. `undefined` means the
 * property holds nothing; the resolver renders that as an empty string.
 */
export function toFieldValue(raw: unknown): FieldValue | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }
  if (typeof raw === 'boolean') {
    return raw;
  }
  if (Array.isArray(raw)) {
    const members: string[] = [];
    for (const item of raw) {
      const converted = scalarToString(item);
      if (converted !== undefined) members.push(converted);
    }
    return members;
  }
  return scalarToString(raw) ?? '';
}

export function asText(value: FieldValue): string {
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (typeof value === 'string') {
    return value;
  }
  return value[0] ?? '';
}

const TRUE_VALUES = ['true', '1'];
const FALSE_VALUES = ['false', '0'];

/**
 * Does `candidate` (an option or checkbox value) match the resolved value?
 */
export function matchesValue(value: FieldValue, candidate: string): boolean {
  if (typeof value === 'boolean') {
    return (value ? TRUE_VALUES : FALSE_VALUES).includes(candidate);
  }
  if (typeof value === 'string') {
    return value === candidate;
  }
  return value.includes(candidate);
}

/** Outcome of looking a field up on the model. */
export type ModelLookup = { found: true; raw: unknown } | { found: false };

/**
 * Finds the top-level property whose form name is `name`. A property with a
 * binding answers only to its bound name. A property holding `null` or
 * `undefined` is still found.
 */
export function readModelField(model: object, name: string, bindings: FieldBindings): ModelLookup {
  for (const property of Object.keys(model)) {
    const formName = Object.prototype.hasOwnProperty.call(bindings, property)
      ? bindings[property]
      : property;
    if (formName === name) {
      return { found: true, raw: Reflect.get(model, property) };
    }
  }
  return { found: false };
}

/**
 * Resolves `a.b.c` by walking plain properties.
 */
export const dottedPathResolver: PathResolver = (model, name) => {
  if (!name.includes('.')) {
    return undefined;
  }
  let current: unknown = model;
  for (const segment of name.split('.')) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    if (!Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
};

export class ValueResolver {
  constructor(private readonly config: ResolvedFormConfig) {}

  resolve(name: string, fallback?: FieldValue): ResolvedValue {
    const old = this.config.oldInput.get(name);
    if (old && old.length > 0) {
      return { source: 'old', value: old };
    }

    const fromModel = this.fromModel(name);
    if (fromModel !== undefined) {
      return { source: 'model', value: fromModel };
    }

    if (fallback !== undefined) {
      return { source: 'default', value: fallback };
    }

    return { source: 'empty', value: '' };
  }

  /** The string a text-like control renders. */
  text(name: string, fallback?: string): string {
    return asText(this.resolve(name, fallback).value);
  }

  private fromModel(name: string): FieldValue | undefined {
    const { model, bindings, pathResolver } = this.config;
    if (!model) {
      return undefined;
    }
    const lookup = readModelField(model, name, bindings);
    if (lookup.found) {
      return toFieldValue(lookup.raw) ?? '';
    }
    if (!pathResolver) {
      return undefined;
    }
    const nested = pathResolver(model, name);
    return nested === undefined ? undefined : (toFieldValue(nested) ?? '');
  }
}
