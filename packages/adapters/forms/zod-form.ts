/**
 * Zod Forms
 *
 * Form classes whose fields are declared as a zod object shape.
 * A bound form reads `<prefix>-<field>` keys from the submitted payload,
 * treats empty strings as missing values, and validates through the schema.
 *
 * @module packages/adapters/forms/zod-form
 */

import { z } from 'zod';
import type {
  FieldDescriptor,
  FormClass,
  FormClassKind,
  FormConstructionOptions,
  FormData,
  FormFiles,
  UploadedFile,
  WizardForm,
} from '@stepwise/core/ports';

// =============================================================================
// File Fields
// =============================================================================

const fileSchemas = new WeakSet<z.ZodTypeAny>();

/**
 * Check whether a value is an uploaded file.
 */
export function isUploadedFile(value: unknown): value is UploadedFile {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    typeof Reflect.get(value, 'name') === 'string' &&
    typeof Reflect.get(value, 'contentType') === 'string' &&
    typeof Reflect.get(value, 'size') === 'number' &&
    Buffer.isBuffer(Reflect.get(value, 'content'))
  );
}

/**
 * Declare a file upload field.
 */
export function fileField(message = 'A file is required'): z.ZodType<UploadedFile> {
  const schema = z.custom<UploadedFile>(isUploadedFile, { message });
  fileSchemas.add(schema);
  return schema;
}

function isFileSchema(schema: z.ZodTypeAny): boolean {
  if (fileSchemas.has(schema)) {
    return true;
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return isFileSchema(schema.unwrap());
  }
  return false;
}

function describeFields(shape: z.ZodRawShape): Record<string, FieldDescriptor> {
  const fields: Record<string, FieldDescriptor> = {};
  for (const [name, schema] of Object.entries(shape)) {
    fields[name] = {
      kind: isFileSchema(schema) ? 'file' : 'value',
      required: !schema.isOptional(),
    };
  }
  return fields;
}

// =============================================================================
// Helpers
// =============================================================================

type ParseResult<S extends z.ZodRawShape> = z.SafeParseReturnType<
  z.input<z.ZodObject<S>>,
  z.output<z.ZodObject<S>>
>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Join a prefix and a field name the way bound payload keys are written.
 */
export function addPrefix(prefix: string, field: string): string {
  return prefix ? `${prefix}-${field}` : field;
}

/**
 * First submitted value of a key; multi-value keys yield their first entry.
 */
export function firstValue(value: FormData[string] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

// =============================================================================
// ZodForm
// =============================================================================

/**
 * A form class backed by a zod object schema.
 */
export interface ZodFormClass<S extends z.ZodRawShape> extends FormClass<ZodForm<S>> {
  readonly schema: z.ZodObject<S>;
}

/**
 * A constructed zod form.
 */
export class ZodForm<S extends z.ZodRawShape> implements WizardForm {
  readonly prefix: string;
  readonly data: FormData | null;
  readonly files: FormFiles | null;
  readonly initial: Readonly<Record<string, unknown>>;
  readonly instance: unknown;
  readonly extra: Readonly<Record<string, unknown>>;

  private result: ParseResult<S> | null = null;

  constructor(
    readonly formClass: ZodFormClass<S>,
    options: FormConstructionOptions
  ) {
    this.prefix = options.prefix;
    this.data = options.data;
    this.files = options.files;
    this.initial = isRecord(options.initial) ? options.initial : {};
    this.instance = options.instance ?? null;
    this.extra = options.extra ?? {};
  }

  get isBound(): boolean {
    return this.data !== null || this.files !== null;
  }

  isValid(): boolean {
    if (!this.isBound) {
      return false;
    }
    return this.validate().success;
  }

  get cleanedData(): z.output<z.ZodObject<S>> | null {
    if (!this.isBound) {
      return null;
    }
    const result = this.validate();
    return result.success ? result.data : null;
  }

  get errors(): Readonly<Record<string, string[]>> {
    if (!this.isBound) {
      return {};
    }
    const result = this.validate();
    if (result.success) {
      return {};
    }
    const errors: Record<string, string[]> = {};
    for (const issue of result.error.issues) {
      const field = issue.path.length > 0 ? String(issue.path[0]) : '__all__';
      (errors[field] ??= []).push(issue.message);
    }
    return errors;
  }

  /**
   * Name of a field's input, including the prefix.
   */
  fieldName(field: string): string {
    return addPrefix(this.prefix, field);
  }

  /**
   * Value to display for a field: the bound value, else the initial value,
   * else the matching property of the bound instance.
   */
  value(field: string): unknown {
    const key = this.fieldName(field);
    if (this.isBound) {
      return this.formClass.baseFields[field]?.kind === 'file'
        ? this.files?.[key]
        : this.data?.[key];
    }
    if (field in this.initial) {
      return this.initial[field];
    }
    return isRecord(this.instance) ? this.instance[field] : undefined;
  }

  private validate(): ParseResult<S> {
    if (!this.result) {
      this.result = this.formClass.schema.safeParse(this.collectValues());
    }
    return this.result;
  }

  private collectValues(): Record<string, unknown> {
    const values: Record<string, unknown> = {};
    for (const [field, descriptor] of Object.entries(this.formClass.baseFields)) {
      const key = this.fieldName(field);
      if (descriptor.kind === 'file') {
        values[field] = this.files?.[key];
        continue;
      }
      const raw = this.data?.[key];
      values[field] = raw === '' ? undefined : raw;
    }
    return values;
  }
}

/**
 * Declare a form class.
 *
 * @param formName - Display name of the form
 * @param shape - zod shape of the form's fields
 * @param options - `kind: 'model-form'` makes the form bind a persistent instance
 *
 * @example
 * const ContactForm = defineForm('ContactForm', {
 *   name: z.string().min(1),
 *   email: z.string().email(),
 * });
 */
export function defineForm<S extends z.ZodRawShape>(
  formName: string,
  shape: S,
  options: { kind?: FormClassKind } = {}
): ZodFormClass<S> {
  const formClass: ZodFormClass<S> = {
    kind: options.kind ?? 'form',
    formName,
    schema: z.object(shape),
    baseFields: Object.freeze(describeFields(shape)),
    create: (constructionOptions) => new ZodForm(formClass, constructionOptions),
  };
  return Object.freeze(formClass);
}
