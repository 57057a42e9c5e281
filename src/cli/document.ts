/**
 * Form documents
 *
 * JSON description of a form used by the CLI to preview markup and try
 * rules without a running application:
 *
 *   {
 *     "form": { "action": "/users/1", "method": "PUT", "model": { "Name": "Ada" } },
 *     "fields": [
 *       { "name": "name", "property": "Name", "label": "Name", "rules": "required,max=80" },
 *       { "name": "role", "control": "select", "options": [{ "value": "1", "text": "Admin" }] }
 *     ],
 *     "submit": "Save",
 *     "values": { "Name": "" }
 *   }
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import { createFormBuilder, type FormBuilder } from '../form/builder.js';
import type { SafeHtml } from '../form/html.js';
import { defineForm, type FieldDefinition, type FormDefinition } from '../validation/definition.js';
import { DocumentError, tryAsync, trySync } from '../shared/error-handler.js';
import type { Logger } from '../shared/logger.js';

const attributesSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

const optionSchema = z.object({
  value: z.string(),
  text: z.string(),
  group: z.string().optional(),
  disabled: z.boolean().optional(),
});

const controlSchema = z.enum([
  'text',
  'email',
  'password',
  'hidden',
  'file',
  'number',
  'tel',
  'url',
  'date',
  'search',
  'textarea',
  'select',
  'checkbox',
  'radio',
]);

const fieldSchema = z.object({
  name: z.string().min(1),
  control: controlSchema.default('text'),
  label: z.string().optional(),
  /** Declared value of a checkbox or radio */
  value: z.string().optional(),
  options: z.array(optionSchema).optional(),
  /** Model property bound to this field */
  property: z.string().min(1).optional(),
  rules: z.string().optional(),
  attrs: attributesSchema.optional(),
});

const formSchema = z.object({
  action: z.string().optional(),
  method: z.string().optional(),
  csrfToken: z.string().optional(),
  csrfField: z.string().optional(),
  multipart: z.boolean().optional(),
  model: z.record(z.unknown()).optional(),
  oldInput: z.record(z.union([z.string(), z.array(z.string())])).optional(),
  errors: z.record(z.string()).optional(),
});

export const formDocumentSchema = z.object({
  form: formSchema.default({}),
  fields: z.array(fieldSchema).default([]),
  submit: z.string().optional(),
  /** Record to validate, keyed by model property */
  values: z.record(z.unknown()).optional(),
});

export type FormDocument = z.infer<typeof formDocumentSchema>;
export type DocumentField = FormDocument['fields'][number];

export function parseFormDocument(input: unknown, source = 'document'): FormDocument {
  const result = formDocumentSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new DocumentError(
      `Invalid form document ${source}: ${problems.join('; ')}`,
      { source, problems },
      'Compare the document with the example in the README'
    );
  }
  return result.data;
}

export async function loadFormDocument(file: string): Promise<FormDocument> {
  const raw = await tryAsync(
    () => fs.readFile(file, 'utf-8'),
    `Cannot read ${file}`,
    'Check the path and its permissions',
    DocumentError
  );
  const parsed = trySync<unknown>(() => JSON.parse(raw), `${file} is not valid JSON`, undefined, DocumentError);
  return parseFormDocument(parsed, file);
}

/**
 * Bindings and rules declared by the document's fields.
 */
export function documentDefinition(doc: FormDocument): FormDefinition {
  const fields: Record<string, FieldDefinition> = {};
  for (const field of doc.fields) {
    const property = field.property ?? field.name;
    fields[property] = {
      form: field.name,
      label: field.label ?? property,
      rules: field.rules,
    };
  }
  return defineForm(fields);
}

function renderControl(form: FormBuilder, field: DocumentField): SafeHtml {
  const { name, attrs } = field;
  switch (field.control) {
    case 'textarea':
      return form.textarea(name, attrs);
    case 'select':
      return form.select(name, field.options ?? [], attrs);
    case 'checkbox':
      return form.checkbox(name, field.value ?? '1', attrs);
    case 'radio':
      return form.radio(name, field.value ?? '1', attrs);
    default:
      return form.input(field.control, name, attrs);
  }
}

/**
 * Markup for the whole document, one fragment per line.
 */
export function renderFormDocument(doc: FormDocument, logger?: Logger): string {
  const form = createFormBuilder({
    ...doc.form,
    bindings: documentDefinition(doc).bindings,
    logger,
  });

  const lines: string[] = [form.open().toString()];
  for (const field of doc.fields) {
    const checkable = field.control === 'checkbox' || field.control === 'radio';
    const label =
      field.label !== undefined && field.control !== 'hidden'
        ? form.label(field.name, field.label, checkable ? { class: 'form-check-label' } : undefined)
        : undefined;

    if (label && !checkable) lines.push(label.toString());
    lines.push(renderControl(form, field).toString());
    if (label && checkable) lines.push(label.toString());

    const feedback = form.fieldError(field.name);
    if (feedback.length > 0) lines.push(feedback.toString());
  }
  if (doc.submit !== undefined) {
    lines.push(form.submit(doc.submit).toString());
  }
  lines.push(form.close().toString());

  return lines.join('\n') + '\n';
}
