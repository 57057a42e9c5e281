/**
 * Rule tags
 *
 * A compact, declarative way to attach rules to a form field:
 *
 *   'required,email,max=120'
 *   'min=8'
 *   'oneof=admin editor viewer'
 *
 * Each tag compiles to a zod schema that reports only the first failing rule.
 * Fields without `required` accept an empty value and skip their other rules.
 */

import { z } from 'zod';
import { ConfigurationError } from '../shared/error-handler.js';

export type RuleName = 'required' | 'email' | 'url' | 'numeric' | 'min' | 'max' | 'len' | 'oneof';

export interface Rule {
  name: RuleName;
  param?: string;
}

const RULES_WITH_LIMIT: ReadonlySet<RuleName> = new Set(['min', 'max', 'len']);
const KNOWN_RULES: ReadonlySet<string> = new Set([
  'required',
  'email',
  'url',
  'numeric',
  'min',
  'max',
  'len',
  'oneof',
]);

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const NUMERIC_PATTERN = /^[-+]?\d+(\.\d+)?$/;

function isRuleName(name: string): name is RuleName {
  return KNOWN_RULES.has(name);
}

export function parseRuleTag(tag: string): Rule[] {
  const rules: Rule[] = [];
  for (const part of tag.split(',')) {
    const trimmed = part.trim();
    if (!trimmed) continue;

    const eq = trimmed.indexOf('=');
    const name = eq === -1 ? trimmed : trimmed.slice(0, eq).trim();
    const param = eq === -1 ? undefined : trimmed.slice(eq + 1).trim();

    if (!isRuleName(name)) {
      throw new ConfigurationError(
        `Unknown validation rule "${name}" in "${tag}"`,
        { tag, rule: name },
        `Use one of: ${[...KNOWN_RULES].join(', ')}`
      );
    }
    if (RULES_WITH_LIMIT.has(name) && !(param && /^\d+$/.test(param))) {
      throw new ConfigurationError(`Rule "${name}" needs a whole number, as in ${name}=3`, {
        tag,
        rule: name,
      });
    }
    if (name === 'oneof' && !param) {
      throw new ConfigurationError('Rule "oneof" needs a space separated list of values', {
        tag,
        rule: name,
      });
    }
    rules.push(param === undefined ? { name } : { name, param });
  }
  return rules;
}

export function isEmptyValue(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === '' ||
    value === false ||
    (Array.isArray(value) && value.length === 0)
  );
}

function measure(value: unknown): { size: number; unit: string } | undefined {
  if (typeof value === 'string') return { size: value.length, unit: ' characters' };
  if (typeof value === 'number') return { size: value, unit: '' };
  if (Array.isArray(value)) return { size: value.length, unit: ' items' };
  return undefined;
}

function isUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Message for the first rule `value` breaks, if any.
 */
export function checkRules(rules: readonly Rule[], value: unknown, label: string): string | undefined {
  if (isEmptyValue(value)) {
    return rules.some((rule) => rule.name === 'required') ? `${label} is required` : undefined;
  }

  for (const rule of rules) {
    switch (rule.name) {
      case 'required':
        break;
      case 'email':
        if (typeof value !== 'string' || !EMAIL_PATTERN.test(value)) {
          return `${label} must be a valid email address`;
        }
        break;
      case 'url':
        if (typeof value !== 'string' || !isUrl(value)) {
          return `${label} must be a valid URL`;
        }
        break;
      case 'numeric': {
        const ok =
          (typeof value === 'number' && Number.isFinite(value)) ||
          (typeof value === 'string' && NUMERIC_PATTERN.test(value.trim()));
        if (!ok) {
          return `${label} must be a number`;
        }
        break;
      }
      case 'min':
      case 'max':
      case 'len': {
        const limit = Number(rule.param);
        const measured = measure(value);
        if (!measured) break;
        const { size, unit } = measured;
        if (rule.name === 'min' && size < limit) {
          return `${label} must be at least ${limit}${unit}`;
        }
        if (rule.name === 'max' && size > limit) {
          return `${label} must be at most ${limit}${unit}`;
        }
        if (rule.name === 'len' && size !== limit) {
          return `${label} must be exactly ${limit}${unit}`;
        }
        break;
      }
      case 'oneof': {
        const allowed = (rule.param ?? '').split(/\s+/).filter(Boolean);
        if (!allowed.includes(String(value))) {
          return `${label} must be one of: ${allowed.join(', ')}`;
        }
        break;
      }
    }
  }
  return undefined;
}

/**
 * zod schema enforcing a rule tag.
 */
export function ruleSchema(tag: string, label: string): z.ZodTypeAny {
  const rules = parseRuleTag(tag);
  return z.unknown().superRefine((value, ctx) => {
    const message = checkRules(rules, value, label);
    if (message) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    }
  });
}
