/**
 * Validation adapter
 *
 * Runs a FormDefinition's rules over a record and returns one message per
 * failed field, keyed by the field's form name so the result can be handed
 * straight to a FormBuilder as `errors`.
 */

import { getLogger } from '../settings.js';
import { ValidationError } from '../shared/error-handler.js';
import type { Logger } from '../shared/logger.js';
import type { FormDefinition } from './definition.js';

export interface ValidationOutcome {
  /** Form name -> first failure message for that field. */
  errors: Record<string, string>;
  failed: boolean;
}

function isRecordShaped(value: unknown): value is object {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map) &&
    !(value instanceof Set) &&
    !(value instanceof Date)
  );
}

/**
 * Holds no per-call state; one instance serves every request.
 */
export class FormValidator {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? getLogger().child({ scope: 'validator' });
  }

  /**
   * @throws ValidationError when `record` is not an object with fields.
   */
  validate(record: unknown, definition: FormDefinition): ValidationOutcome {
    if (!isRecordShaped(record)) {
      throw new ValidationError(
        `Cannot validate ${Array.isArray(record) ? 'an array' : typeof record}: expected a record`,
        { received: record === null ? 'null' : typeof record },
        'Pass the object holding the submitted fields'
      );
    }

    const result = definition.schema.safeParse(record);
    if (result.success) {
      return { errors: {}, failed: false };
    }

    const errors = new Map<string, string>();
    for (const issue of result.error.issues) {
      const property = issue.path[0];
      if (typeof property !== 'string') {
        this.logger.debug('Ignoring validation issue without a field', { message: issue.message });
        continue;
      }
      const formName = definition.formName(property);
      if (!errors.has(formName)) {
        errors.set(formName, issue.message);
      }
    }

    const fields = [...errors.keys()];
    this.logger.debug('Validation failed', { fields });
    return { errors: Object.fromEntries(errors), failed: fields.length > 0 };
  }
}

let sharedValidator: FormValidator | undefined;

export function getValidator(): FormValidator {
  if (!sharedValidator) {
    sharedValidator = new FormValidator();
  }
  return sharedValidator;
}

export function validate(record: unknown, definition: FormDefinition): ValidationOutcome {
  return getValidator().validate(record, definition);
}
