/**
 * Form Builder
 *
 * One builder per form render. It holds a frozen copy of the form's context
 * and turns each control call into a SafeHtml fragment:
 *
 *   const form = createFormBuilder({ action: '/users/1', method: 'PUT', csrfToken, model: user, errors });
 *   form.open();
 *   form.label('email', 'Email');
 *   form.email('email');
 *   form.fieldError('email');
 *   form.close();
 *
 * Nothing is written after construction, so repeated calls for a field
 * return identical markup and concurrent renders may share a builder.
 */

import {
  mergeAttributes,
  type AttributeEntry,
  type Attributes,
  type AttributeValue,
} from './attributes.js';
import {
  normalizeFormConfig,
  spoofedMethod,
  transportMethod,
  type FormConfig,
  type ResolvedFormConfig,
} from './config.js';
import {
  concatHtml,
  element,
  EMPTY_HTML,
  SafeHtml,
  startTag,
  text as htmlText,
  voidElement,
} from './html.js';
import { asText, matchesValue, ValueResolver, type FieldValue } from './values.js';
import { escapeHtml } from '../shared/security.js';

export const METHOD_FIELD = '_method';

export type InputType =
  | 'text'
  | 'email'
  | 'password'
  | 'hidden'
  | 'file'
  | 'number'
  | 'tel'
  | 'url'
  | 'date'
  | 'search';

export interface SelectOption {
  value: string;
  text: string;
  /** Consecutive options with the same group share one `<optgroup>`. */
  group?: string;
  disabled?: boolean;
}

const FORM_ATTRIBUTE_ORDER = ['action', 'method', 'enctype'];
const LABEL_ATTRIBUTE_ORDER = ['for'];

/** Inputs that render without the `form-control` class. */
const BARE_INPUTS: ReadonlySet<InputType> = new Set(['hidden', 'file']);

/**
 * A caller's `value` attribute is the control's explicit default, used only
 * when neither old input nor the model has the field.
 */
function explicitDefault(value: AttributeValue): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}

function isEnabled(value: AttributeValue): boolean {
  return value !== undefined && value !== null && value !== false;
}

export class FormBuilder {
  private readonly config: ResolvedFormConfig;
  private readonly values: ValueResolver;

  constructor(config: FormConfig = {}) {
    this.config = normalizeFormConfig(config);
    this.values = new ValueResolver(this.config);

    if (this.config.logger.isLevelEnabled('debug')) {
      this.config.logger.debug('Form builder created', {
        action: this.config.action,
        method: this.config.method,
        model: this.config.model !== null,
        oldInput: this.config.oldInput.size,
        errors: this.config.errors.size,
      });
    }
  }

  // ══════════════════════════════════════════════════════════════════════════
  // FORM
  // ══════════════════════════════════════════════════════════════════════════

  /**
   * Opening `<form>` tag followed by the `_method` override (for PUT, PATCH
   * and DELETE) and the CSRF token, in that order.
   */
  open(attrs?: Attributes): SafeHtml {
    const { action, method, multipart, csrfField, csrfToken, logger } = this.config;

    const tag = startTag(
      'form',
      mergeAttributes(
        {
          action,
          method: transportMethod(method),
          enctype: multipart ? 'multipart/form-data' : undefined,
        },
        [attrs],
        { order: FORM_ATTRIBUTE_ORDER, logger }
      )
    );

    const fragments = [tag];
    const spoofed = spoofedMethod(method);
    if (spoofed) {
      fragments.push(this.hiddenField(METHOD_FIELD, spoofed));
    }
    if (csrfToken) {
      fragments.push(this.hiddenField(csrfField, csrfToken));
    }
    return concatHtml(...fragments);
  }

  close(): SafeHtml {
    return new SafeHtml('</form>');
  }

  label(name: string, labelText: string | SafeHtml, attrs?: Attributes): SafeHtml {
    return element(
      'label',
      mergeAttributes({ for: name }, [attrs], {
        order: LABEL_ATTRIBUTE_ORDER,
        logger: this.config.logger,
      }),
      htmlText(labelText)
    );
  }

  // ══════════════════════════════════════════════════════════════════════════
  // INPUTS
  // ══════════════════════════════════════════════════════════════════════════

  input(type: InputType, name: string, attrs?: Attributes): SafeHtml {
    const defaults: Record<string, AttributeValue> = { type, name };

    if (type === 'password') {
      defaults.value = '';
    } else if (type !== 'file') {
      defaults.value = this.values.text(name, explicitDefault(attrs?.value));
    }
    if (!BARE_INPUTS.has(type)) {
      defaults.class = 'form-control';
    }

    return voidElement('input', this.controlAttributes(name, defaults, attrs));
  }

  text(name: string, attrs?: Attributes): SafeHtml {
    return this.input('text', name, attrs);
  }

  email(name: string, attrs?: Attributes): SafeHtml {
    return this.input('email', name, attrs);
  }

  /** Never prefilled, whatever the old input or model hold. */
  password(name: string, attrs?: Attributes): SafeHtml {
    return this.input('password', name, attrs);
  }

  hidden(name: string, attrs?: Attributes): SafeHtml {
    return this.input('hidden', name, attrs);
  }

  /**
   * File inputs carry no value. The form must be opened with
   * `multipart: true` for the upload to be sent.
   */
  file(name: string, attrs?: Attributes): SafeHtml {
    return this.input('file', name, attrs);
  }

  number(name: string, attrs?: Attributes): SafeHtml {
    return this.input('number', name, attrs);
  }

  tel(name: string, attrs?: Attributes): SafeHtml {
    return this.input('tel', name, attrs);
  }

  url(name: string, attrs?: Attributes): SafeHtml {
    return this.input('url', name, attrs);
  }

  date(name: string, attrs?: Attributes): SafeHtml {
    return this.input('date', name, attrs);
  }

  search(name: string, attrs?: Attributes): SafeHtml {
    return this.input('search', name, attrs);
  }

  textarea(name: string, attrs?: Attributes): SafeHtml {
    const body = escapeHtml(this.values.text(name, explicitDefault(attrs?.value)));
    return element(
      'textarea',
      this.controlAttributes(name, { name, class: 'form-control' }, attrs),
      body
    );
  }

  // ══════════════════════════════════════════════════════════════════════════
  // CHOICES
  // ══════════════════════════════════════════════════════════════════════════

  /**
   * A single select marks the first matching option; a `multiple` select
   * marks every option whose value is in the resolved list.
   */
  select(name: string, options: readonly SelectOption[], attrs?: Attributes): SafeHtml {
    const multiple = isEnabled(attrs?.multiple);
    const resolved = this.values.resolve(name, explicitDefault(attrs?.value)).value;
    const selection: FieldValue = multiple || typeof resolved === 'boolean' ? resolved : asText(resolved);

    let selectedOne = false;
    const renderOption = (option: SelectOption): string => {
      let selected = matchesValue(selection, option.value);
      if (!multiple) {
        selected = selected && !selectedOne;
        selectedOne = selectedOne || selected;
      }
      return element(
        'option',
        mergeAttributes({
          value: option.value,
          selected: selected || undefined,
          disabled: option.disabled || undefined,
        }),
        escapeHtml(option.text)
      ).toString();
    };

    let body = '';
    for (let i = 0; i < options.length; ) {
      const group = options[i].group;
      if (!group) {
        body += renderOption(options[i]);
        i++;
        continue;
      }
      let groupBody = '';
      while (i < options.length && options[i].group === group) {
        groupBody += renderOption(options[i]);
        i++;
      }
      body += element('optgroup', mergeAttributes({ label: group }), groupBody).toString();
    }

    return element('select', this.controlAttributes(name, { name, class: 'form-select' }, attrs), body);
  }

  /**
   * Checkbox preceded by a hidden input carrying "0", so an unchecked box
   * still submits its key. `uncheckedValue` changes that value; `false`
   * leaves the hidden input out. A caller's `checked` applies only when
   * neither old input nor the model has the field.
   */
  checkbox(name: string, value: string, attrs?: Attributes): SafeHtml {
    const unchecked = attrs?.uncheckedValue;
    const box = this.checkable('checkbox', name, value, attrs);
    if (unchecked === false) {
      return box;
    }
    const companionValue = explicitDefault(unchecked) ?? '0';
    return concatHtml(this.hiddenField(name, companionValue), box);
  }

  radio(name: string, value: string, attrs?: Attributes): SafeHtml {
    return this.checkable('radio', name, value, attrs);
  }

  // ══════════════════════════════════════════════════════════════════════════
  // BUTTONS & FEEDBACK
  // ══════════════════════════════════════════════════════════════════════════

  submit(label: string | SafeHtml, attrs?: Attributes): SafeHtml {
    return this.buttonElement('submit', 'btn btn-primary', label, attrs);
  }

  button(label: string | SafeHtml, attrs?: Attributes): SafeHtml {
    return this.buttonElement('button', 'btn btn-secondary', label, attrs);
  }

  fieldError(name: string): SafeHtml {
    const message = this.error(name);
    if (!message) {
      return EMPTY_HTML;
    }
    return element('div', [['class', 'invalid-feedback']], escapeHtml(message));
  }

  // ══════════════════════════════════════════════════════════════════════════
  // ACCESSORS
  // ══════════════════════════════════════════════════════════════════════════

  csrfField(): string {
    return this.config.csrfField;
  }

  csrfToken(): string {
    return this.config.csrfToken;
  }

  errors(): Record<string, string> {
    return Object.fromEntries(this.config.errors);
  }

  oldInput(): Record<string, string[]> {
    const copy: Record<string, string[]> = {};
    for (const [key, list] of this.config.oldInput) {
      copy[key] = [...list];
    }
    return copy;
  }

  hasError(name: string): boolean {
    return this.config.errors.has(name);
  }

  error(name: string): string {
    return this.config.errors.get(name) ?? '';
  }

  /**
   * First submitted value for `name`, or `fallback` when it was not submitted.
   */
  old(name: string, fallback = ''): string {
    return this.config.oldInput.get(name)?.[0] ?? fallback;
  }

  /**
   * The string a text control for `name` would render.
   */
  value(name: string, fallback?: string): string {
    return this.values.text(name, fallback);
  }

  // ══════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ══════════════════════════════════════════════════════════════════════════

  private controlAttributes(
    name: string,
    defaults: Attributes,
    attrs?: Attributes
  ): AttributeEntry[] {
    return mergeAttributes(defaults, [attrs], {
      invalid: this.hasError(name),
      exclude: ['value', 'checked'],
      logger: this.config.logger,
    });
  }

  private checkable(
    type: 'checkbox' | 'radio',
    name: string,
    value: string,
    attrs?: Attributes
  ): SafeHtml {
    const resolved = this.values.resolve(name);
    const checked =
      resolved.source === 'empty'
        ? isEnabled(attrs?.checked)
        : matchesValue(resolved.value, value);

    return voidElement(
      'input',
      this.controlAttributes(
        name,
        { type, name, value, class: 'form-check-input', checked: checked || undefined },
        attrs
      )
    );
  }

  private hiddenField(name: string, value: string): SafeHtml {
    return voidElement('input', mergeAttributes({ type: 'hidden', name, value }));
  }

  private buttonElement(
    type: 'submit' | 'button',
    className: string,
    label: string | SafeHtml,
    attrs?: Attributes
  ): SafeHtml {
    return element(
      'button',
      mergeAttributes({ type, class: className }, [attrs], { logger: this.config.logger }),
      htmlText(label)
    );
  }
}

export function createFormBuilder(config: FormConfig = {}): FormBuilder {
  return new FormBuilder(config);
}
