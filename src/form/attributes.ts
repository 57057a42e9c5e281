/**
 * Attribute merging
 *
 * Defaults computed per control are combined with the caller's maps:
 * later keys win, except `class` whose tokens are unioned in order of first
 * appearance. Names are folded to lower case before merging. `true` renders
 * as a bare keyword (`selected`, `multiple`); `false`, `null` and `undefined`
 * drop the attribute.
 */

import type { Logger } from '../shared/logger.js';
import { isValidAttributeName } from '../shared/security.js';

export type AttributeValue = string | number | boolean | null | undefined;

export type Attributes = Readonly<Record<string, AttributeValue>>;

/** A rendered attribute: escaped later, `true` is a bare keyword. */
export type AttributeEntry = readonly [name: string, value: string | true];

/** Front of the emission order; everything else follows alphabetically. */
export const DEFAULT_ATTRIBUTE_ORDER: readonly string[] = ['type', 'name', 'value'];

export const INVALID_CLASS = 'is-invalid';

/** Builder options passed through attribute maps; never rendered. */
export const RESERVED_ATTRIBUTES: ReadonlySet<string> = new Set(['uncheckedValue']);

export interface MergeOptions {
  /** Append `is-invalid` to the class list. */
  invalid?: boolean;
  /** Keys that lead the output, in this order. */
  order?: readonly string[];
  /** Caller keys the control consumes itself. */
  exclude?: readonly string[];
  logger?: Logger;
}

export function tokenizeClass(value: string): string[] {
  return value.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * Union of class lists, first appearance wins the position.
 */
export function unionClasses(...lists: string[]): string {
  const seen = new Set<string>();
  for (const list of lists) {
    for (const token of tokenizeClass(list)) {
      seen.add(token);
    }
  }
  return [...seen].join(' ');
}

function compareKeys(order: readonly string[]) {
  return (a: AttributeEntry, b: AttributeEntry): number => {
    const ia = order.indexOf(a[0]);
    const ib = order.indexOf(b[0]);
    if (ia !== -1 || ib !== -1) {
      if (ia === -1) return 1;
      if (ib === -1) return -1;
      return ia - ib;
    }
    return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
  };
}

export function mergeAttributes(
  defaults: Attributes,
  callers: readonly (Attributes | undefined)[] = [],
  options: MergeOptions = {}
): AttributeEntry[] {
  const merged = new Map<string, AttributeValue>();
  const classLists: string[] = [];
  let hasClass = false;
  const exclude = new Set(options.exclude ?? []);

  const absorb = (source: Attributes, isCaller: boolean) => {
    for (const [rawKey, value] of Object.entries(source)) {
      if (RESERVED_ATTRIBUTES.has(rawKey)) {
        continue;
      }
      // HTML attribute names are case-insensitive
      const key = rawKey.toLowerCase();
      if (isCaller && exclude.has(key)) {
        continue;
      }
      if (key === 'class') {
        if (typeof value === 'string') {
          classLists.push(value);
          hasClass = true;
        }
        continue;
      }
      merged.set(key, value);
    }
  };

  absorb(defaults, false);
  for (const caller of callers) {
    if (caller) {
      absorb(caller, true);
    }
  }

  if (options.invalid) {
    classLists.push(INVALID_CLASS);
    hasClass = true;
  }
  if (hasClass) {
    merged.set('class', unionClasses(...classLists));
  }

  const entries: AttributeEntry[] = [];
  for (const [key, value] of merged) {
    if (!isValidAttributeName(key)) {
      options.logger?.debug('Dropping attribute with invalid name', { attribute: key });
      continue;
    }
    if (value === true) {
      entries.push([key, true]);
    } else if (typeof value === 'string') {
      entries.push([key, value]);
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      entries.push([key, String(value)]);
    }
  }

  return entries.sort(compareKeys(options.order ?? DEFAULT_ATTRIBUTE_ORDER));
}
