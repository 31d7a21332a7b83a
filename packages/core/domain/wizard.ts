/**
 * Wizard Domain Types
 *
 * Defines the step model and the persisted state of a multi-form wizard.
 * A wizard is an ordered sequence of steps; each step collects input from a
 * single form, a formset, or a group of tagged sub-forms:
 *
 *   contact (form) → addresses (formset) → preferences (grouped: { a, b }) → done
 *
 * The persisted state records the current step and, per step, the payload the
 * step validated against.
 */

import type { AnyFormClass, FormClass, FormData, FormSetClass } from '../ports/form.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Posted field naming the step to jump to without validating the current one.
 */
export const GOTO_STEP_FIELD = 'wizard_goto_step';

/**
 * Default address name of the terminal "done" step (named-URL wizards).
 */
export const DEFAULT_DONE_STEP_NAME = 'done';

// =============================================================================
// Step Definitions
// =============================================================================

/**
 * A step holding exactly one form.
 */
export interface SingleFormStep {
  kind: 'single';
  name: string;
  form: FormClass;
}

/**
 * A step holding a formset.
 */
export interface FormSetStep {
  kind: 'formset';
  name: string;
  formset: FormSetClass;
}

/**
 * A step holding several forms, each identified by a tag unique within the step.
 */
export interface GroupedFormsStep {
  kind: 'grouped';
  name: string;
  forms: ReadonlyMap<string, AnyFormClass>;
}

/**
 * Step definition, resolved once when the step collection is built.
 */
export type StepDefinition = SingleFormStep | FormSetStep | GroupedFormsStep;

/**
 * Ordered, immutable mapping of step name to step definition.
 */
export type StepCollection = ReadonlyMap<string, StepDefinition>;

/**
 * Tagged sub-forms declared for a grouped step.
 */
export type TaggedForms = Readonly<Record<string, AnyFormClass>>;

/**
 * One declared entry of a wizard's form list:
 * - a bare form class (named by its zero-based position)
 * - a `[name, formClass]` pair
 * - a `[name, { tag: formClass }]` pair
 */
export type FormListEntry =
  | AnyFormClass
  | readonly [string | number, AnyFormClass]
  | readonly [string | number, TaggedForms];

// =============================================================================
// Persisted State
// =============================================================================

/**
 * Reference to an uploaded file kept in file storage between requests.
 */
export interface StoredFileRef {
  /** Name under which file storage holds the file */
  tmpName: string;
  /** Original file name */
  name: string;
  /** MIME type */
  contentType: string;
  /** Size in bytes */
  size: number;
}

/**
 * The persisted record of one wizard traversal.
 */
export interface WizardStateData {
  /** Current step (null before the wizard starts) */
  step: string | null;
  /** Submitted payload per step */
  stepData: Record<string, FormData>;
  /** Stored file references per step, keyed by field name */
  stepFiles: Record<string, Record<string, StoredFileRef>>;
  /** Free-form data shared across steps */
  extraData: Record<string, unknown>;
}

/**
 * Create the state of a wizard that has not started.
 */
export function createEmptyState(): WizardStateData {
  return {
    step: null,
    stepData: {},
    stepFiles: {},
    extraData: {},
  };
}

// =============================================================================
// Naming
// =============================================================================

/**
 * Normalize a wizard name into the prefix used for its management marker and
 * storage keys: `CheckoutWizard` → `checkout_wizard`.
 *
 * @param name - Wizard name
 * @returns snake_case prefix
 */
export function normalizeWizardName(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z])([A-Z][a-z])/g, '$1_$2')
    .replace(/[^A-Za-z0-9_]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

/**
 * Get every form class declared for a step, in declaration order.
 */
export function getStepFormClasses(definition: StepDefinition): AnyFormClass[] {
  switch (definition.kind) {
    case 'single':
      return [definition.form];
    case 'formset':
      return [definition.formset];
    case 'grouped':
      return [...definition.forms.values()];
  }
}
