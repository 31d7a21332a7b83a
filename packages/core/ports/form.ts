/**
 * Form Construction Port
 *
 * Contract between the wizard and the forms it drives. The wizard never looks
 * inside a form beyond this surface: it constructs form classes with bound
 * data, asks them to validate, and reads their bound payload back for
 * persistence.
 *
 * @module packages/core/ports/form
 */

// =============================================================================
// Submitted Payload
// =============================================================================

/**
 * A single submitted field value. Multi-valued fields (checkbox groups,
 * multi-selects) arrive as arrays.
 */
export type FormValue = string | string[];

/**
 * Submitted field values keyed by their prefixed field name.
 */
export type FormData = Record<string, FormValue>;

/**
 * An uploaded file held in memory.
 */
export interface UploadedFile {
  /** Original file name */
  name: string;
  /** MIME type */
  contentType: string;
  /** Size in bytes */
  size: number;
  /** File contents */
  content: Buffer;
}

/**
 * Uploaded files keyed by their prefixed field name.
 */
export type FormFiles = Record<string, UploadedFile>;

// =============================================================================
// Field Introspection
// =============================================================================

/**
 * Field kinds the wizard cares about.
 * `file` fields require a file storage backend.
 */
export type FieldKind = 'value' | 'file';

/**
 * Introspection data for a declared field.
 */
export interface FieldDescriptor {
  kind: FieldKind;
  required: boolean;
}

// =============================================================================
// Form Instances
// =============================================================================

/**
 * Keyword arguments used to construct a form or formset.
 */
export interface FormConstructionOptions {
  /** Bound field values (null for an unbound form) */
  data: FormData | null;
  /** Bound files (null for an unbound form) */
  files: FormFiles | null;
  /** Field name prefix */
  prefix: string;
  /** Initial values for an unbound form */
  initial: unknown;
  /** Persistent instance (model forms and inline formsets) */
  instance?: unknown;
  /** Persistent collection (model formsets) */
  queryset?: unknown;
  /** Host-supplied extra arguments */
  extra?: Readonly<Record<string, unknown>>;
}

/**
 * A constructed form (or formset) for one request.
 */
export interface WizardForm {
  readonly prefix: string;
  /** Whether the form was constructed with data */
  readonly isBound: boolean;
  /** The bound field values */
  readonly data: FormData | null;
  /** The bound files */
  readonly files: FormFiles | null;
  /** Validated values; null until the form validated successfully */
  readonly cleanedData: unknown;
  /** Error messages keyed by field name */
  readonly errors: Readonly<Record<string, string[]>>;
  isValid(): boolean;
}

// =============================================================================
// Form Classes
// =============================================================================

/**
 * Kinds of single forms.
 * `model-form` binds a persistent instance.
 */
export type FormClassKind = 'form' | 'model-form';

/**
 * Kinds of formsets.
 * `model-formset` binds a queryset, `inline-formset` a parent instance.
 */
export type FormSetClassKind = 'formset' | 'model-formset' | 'inline-formset';

/**
 * A form class: a factory for form instances with introspectable fields.
 */
export interface FormClass<F extends WizardForm = WizardForm> {
  readonly kind: FormClassKind;
  readonly formName: string;
  readonly baseFields: Readonly<Record<string, FieldDescriptor>>;
  create(options: FormConstructionOptions): F;
}

/**
 * A formset class: repeats an item form.
 */
export interface FormSetClass<F extends WizardForm = WizardForm> {
  readonly kind: FormSetClassKind;
  readonly formName: string;
  /** The item form repeated by the formset */
  readonly form: FormClass;
  create(options: FormConstructionOptions): F;
}

/**
 * Anything that can be declared for a step or a tagged sub-form.
 */
export type AnyFormClass = FormClass | FormSetClass;

const FORM_CLASS_KINDS: readonly string[] = ['form', 'model-form'];
const FORMSET_CLASS_KINDS: readonly string[] = ['formset', 'model-formset', 'inline-formset'];

/**
 * Check whether a value is a form or formset class.
 */
export function isAnyFormClass(value: unknown): value is AnyFormClass {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const kind: unknown = Reflect.get(value, 'kind');
  const create: unknown = Reflect.get(value, 'create');
  return (
    typeof kind === 'string' &&
    (FORM_CLASS_KINDS.includes(kind) || FORMSET_CLASS_KINDS.includes(kind)) &&
    typeof create === 'function'
  );
}

/**
 * Check whether a form class is a formset class.
 */
export function isFormSetClass(formClass: AnyFormClass): formClass is FormSetClass {
  return FORMSET_CLASS_KINDS.includes(formClass.kind);
}

/**
 * The form whose fields describe a class: the item form for formsets.
 */
export function getBaseForm(formClass: AnyFormClass): FormClass {
  return isFormSetClass(formClass) ? formClass.form : formClass;
}

/**
 * How a form class binds persisted objects, if at all.
 */
export function getPersistentBinding(formClass: AnyFormClass): 'instance' | 'queryset' | null {
  switch (formClass.kind) {
    case 'model-form':
    case 'inline-formset':
      return 'instance';
    case 'model-formset':
      return 'queryset';
    default:
      return null;
  }
}
