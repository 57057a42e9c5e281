/**
 * Form definitions
 *
 * The binding between a record's properties and the form: each property
 * names its form field and the rules it must satisfy.
 *
 *   const signup = defineForm({
 *     Name: { form: 'name', rules: 'required,max=80' },
 *     Email: { form: 'email', rules: z.string().email('Enter a valid email') },
 *   });
 *
 * `signup.bindings` feeds a FormBuilder's model lookup; `validate(record, signup)`
 * reports errors under the same form names.
 */

import { z } from 'zod';
import type { FieldBindings } from '../form/config.js';
import { ConfigurationError } from '../shared/error-handler.js';
import { ruleSchema } from './rules.js';

export interface FieldDefinition {
  /** Form field name; defaults to the property name. */
  form?: string;
  /** Name used in rule-tag messages; defaults to the property name. */
  label?: string;
  /** A rule tag such as `required,email`, or any zod schema. */
  rules?: string | z.ZodTypeAny;
}

export type FormFields = Readonly<Record<string, FieldDefinition>>;

export class FormDefinition<F extends FormFields = FormFields> {
  readonly bindings: FieldBindings;
  readonly schema: z.ZodObject<Record<string, z.ZodTypeAny>>;

  constructor(readonly fields: F) {
    const bindings: Record<string, string> = {};
    const shape: Record<string, z.ZodTypeAny> = {};
    const seen = new Map<string, string>();

    for (const [property, field] of Object.entries(fields)) {
      const formName = field.form || property;
      const previous = seen.get(formName);
      if (previous !== undefined) {
        throw new ConfigurationError(
          `Properties "${previous}" and "${property}" are both bound to form field "${formName}"`,
          { formName, properties: [previous, property] }
        );
      }
      seen.set(formName, property);

      if (field.form) {
        bindings[property] = field.form;
      }

      const rules = field.rules;
      if (rules === undefined) {
        shape[property] = z.unknown();
      } else if (typeof rules === 'string') {
        shape[property] = ruleSchema(rules, field.label ?? property);
      } else {
        shape[property] = rules;
      }
    }

    this.bindings = Object.freeze(bindings);
    this.schema = z.object(shape);
  }

  formName(property: string): string {
    return this.fields[property]?.form || property;
  }

  properties(): string[] {
    return Object.keys(this.fields);
  }
}

export function defineForm<F extends FormFields>(fields: F): FormDefinition<F> {
  return new FormDefinition(fields);
}
