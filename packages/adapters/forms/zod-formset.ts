/**
 * Zod Formsets
 *
 * A formset repeats an item form under `<prefix>-<index>` prefixes. The number
 * of submitted items is read from the `<prefix>-TOTAL_FORMS` field.
 *
 * @module packages/adapters/forms/zod-formset
 */

import type { z } from 'zod';
import type {
  FormConstructionOptions,
  FormData,
  FormFiles,
  FormSetClass,
  FormSetClassKind,
  WizardForm,
} from '@stepwise/core/ports';
import { addPrefix, firstValue, type ZodForm, type ZodFormClass } from './zod-form.js';

/**
 * Management field holding the number of submitted items.
 */
export const TOTAL_FORMS_FIELD = 'TOTAL_FORMS';

/**
 * Management field holding the number of items that came from initial data.
 */
export const INITIAL_FORMS_FIELD = 'INITIAL_FORMS';

/**
 * Formset options.
 */
export interface ZodFormSetOptions {
  /** Formset kind (default: 'formset') */
  kind?: FormSetClassKind;
  /** Blank items added to an unbound formset (default: 1) */
  extra?: number;
  /** Minimum number of submitted items (default: 0) */
  minNum?: number;
  /** Maximum number of submitted items (default: 1000) */
  maxNum?: number;
}

/**
 * A formset class repeating a zod form.
 */
export interface ZodFormSetClass<S extends z.ZodRawShape> extends FormSetClass<ZodFormSet<S>> {
  readonly form: ZodFormClass<S>;
  readonly extra: number;
  readonly minNum: number;
  readonly maxNum: number;
}

/**
 * A constructed formset.
 */
export class ZodFormSet<S extends z.ZodRawShape> implements WizardForm {
  readonly prefix: string;
  readonly data: FormData | null;
  readonly files: FormFiles | null;
  /** Parent instance (inline formsets) */
  readonly instance: unknown;
  readonly forms: ZodForm<S>[];
  /** Errors that belong to the formset rather than one item */
  readonly nonFormErrors: string[] = [];

  private readonly initialCount: number;

  constructor(
    readonly formsetClass: ZodFormSetClass<S>,
    options: FormConstructionOptions
  ) {
    this.prefix = options.prefix;
    this.data = options.data;
    this.files = options.files;
    this.instance = formsetClass.kind === 'inline-formset' ? options.instance ?? null : null;

    const initial = Array.isArray(options.initial) ? options.initial : [];
    const queryset = formsetClass.kind === 'model-formset' && Array.isArray(options.queryset)
      ? options.queryset
      : [];
    this.initialCount = Math.max(initial.length, queryset.length);

    const count = this.isBound ? this.boundCount() : this.initialCount + formsetClass.extra;
    this.forms = [];
    for (let index = 0; index < count; index++) {
      this.forms.push(
        formsetClass.form.create({
          data: options.data,
          files: options.files,
          prefix: addPrefix(this.prefix, String(index)),
          initial: initial[index] ?? null,
          instance: queryset[index],
          extra: options.extra,
        })
      );
    }
  }

  get isBound(): boolean {
    return this.data !== null || this.files !== null;
  }

  isValid(): boolean {
    if (!this.isBound) {
      return false;
    }
    // Validate every item so each one carries its errors
    const itemsValid = this.forms.map((form) => form.isValid()).every(Boolean);
    return itemsValid && this.nonFormErrors.length === 0;
  }

  get cleanedData(): Array<z.output<z.ZodObject<S>>> | null {
    const cleaned: Array<z.output<z.ZodObject<S>>> = [];
    for (const form of this.forms) {
      const data = form.cleanedData;
      if (data === null) {
        return null;
      }
      cleaned.push(data);
    }
    return this.isBound && this.nonFormErrors.length === 0 ? cleaned : null;
  }

  get errors(): Readonly<Record<string, string[]>> {
    const errors: Record<string, string[]> = {};
    this.forms.forEach((form, index) => {
      for (const [field, messages] of Object.entries(form.errors)) {
        errors[`${index}.${field}`] = messages;
      }
    });
    if (this.nonFormErrors.length > 0) {
      errors['__all__'] = [...this.nonFormErrors];
    }
    return errors;
  }

  /**
   * Hidden management inputs describing the rendered items.
   */
  managementFields(): Record<string, string> {
    return {
      [addPrefix(this.prefix, TOTAL_FORMS_FIELD)]: String(this.forms.length),
      [addPrefix(this.prefix, INITIAL_FORMS_FIELD)]: String(this.initialCount),
    };
  }

  private boundCount(): number {
    const raw = firstValue(this.data?.[addPrefix(this.prefix, TOTAL_FORMS_FIELD)]);
    const total = raw === undefined ? Number.NaN : Number.parseInt(raw, 10);
    if (!Number.isInteger(total) || total < 0) {
      this.nonFormErrors.push('ManagementForm data is missing or has been tampered with');
      return 0;
    }
    const { minNum, maxNum } = this.formsetClass;
    if (total > maxNum) {
      this.nonFormErrors.push(`Please submit at most ${maxNum} forms.`);
      return maxNum;
    }
    if (total < minNum) {
      this.nonFormErrors.push(`Please submit at least ${minNum} forms.`);
    }
    return total;
  }
}

/**
 * Declare a formset repeating a zod form.
 *
 * @param formName - Display name of the formset
 * @param form - Item form
 * @param options - Formset options
 */
export function defineFormSet<S extends z.ZodRawShape>(
  formName: string,
  form: ZodFormClass<S>,
  options: ZodFormSetOptions = {}
): ZodFormSetClass<S> {
  const formsetClass: ZodFormSetClass<S> = {
    kind: options.kind ?? 'formset',
    formName,
    form,
    extra: options.extra ?? 1,
    minNum: options.minNum ?? 0,
    maxNum: options.maxNum ?? 1000,
    create: (constructionOptions) => new ZodFormSet(formsetClass, constructionOptions),
  };
  return Object.freeze(formsetClass);
}
