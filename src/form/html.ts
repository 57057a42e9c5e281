/**
 * HTML primitives
 *
 * Every fragment the builder returns is a SafeHtml. Template engines that
 * understand a "safe string" (`toHTML()`, Handlebars-style) or simply call
 * `toString()` interpolate it without escaping it a second time.
 */

import { escapeHtml } from '../shared/security.js';
import type { AttributeEntry } from './attributes.js';

export class SafeHtml {
  constructor(private readonly markup: string) {}

  toString(): string {
    return this.markup;
  }

  toHTML(): string {
    return this.markup;
  }

  toJSON(): string {
    return this.markup;
  }

  get length(): number {
    return this.markup.length;
  }
}

export const EMPTY_HTML = new SafeHtml('');

export function isSafeHtml(value: unknown): value is SafeHtml {
  return value instanceof SafeHtml;
}

/**
 * Join fragments into a single fragment.
 */
export function concatHtml(...fragments: SafeHtml[]): SafeHtml {
  return new SafeHtml(fragments.map((fragment) => fragment.toString()).join(''));
}

/**
 * Escape text for element content. SafeHtml passes through untouched.
 */
export function text(value: string | SafeHtml): string {
  return isSafeHtml(value) ? value.toString() : escapeHtml(value);
}

export function renderAttributes(attributes: readonly AttributeEntry[]): string {
  return attributes
    .map(([key, value]) => (value === true ? ` ${key}` : ` ${key}="${escapeHtml(value)}"`))
    .join('');
}

/** An opening tag on its own, such as `<form ...>`. */
export function startTag(tag: string, attributes: readonly AttributeEntry[]): SafeHtml {
  return new SafeHtml(`<${tag}${renderAttributes(attributes)}>`);
}

/** `<input ...>` and other void elements. */
export function voidElement(tag: string, attributes: readonly AttributeEntry[]): SafeHtml {
  return startTag(tag, attributes);
}

/** An element with a body that is already HTML. */
export function element(tag: string, attributes: readonly AttributeEntry[], body = ''): SafeHtml {
  return new SafeHtml(`<${tag}${renderAttributes(attributes)}>${body}</${tag}>`);
}
