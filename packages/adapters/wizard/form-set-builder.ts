/**
 * FormSetBuilder
 *
 * Constructs the form instances of one step for one request. Single and
 * formset steps yield one form prefixed with the step name; grouped steps
 * yield one form per tag, prefixed `<step>-<tag>`, in declaration order.
 *
 * Tags are recorded in a side table owned by the result, never on the forms.
 */

import type { StepCollection, StepDefinition } from '@stepwise/core/domain';
import {
  getPersistentBinding,
  type AnyFormClass,
  type FormConstructionOptions,
  type FormData,
  type FormFiles,
  type WizardForm,
} from '@stepwise/core/ports';

// =============================================================================
// Types
// =============================================================================

/**
 * The forms of one step.
 */
export interface BuiltStepForms {
  step: string;
  forms: WizardForm[];
  /** Tag of each form of a grouped step */
  tags: ReadonlyMap<WizardForm, string>;
}

/**
 * Per-step lookups supplied by the controller.
 */
export interface FormSetBuilderOptions {
  steps: StepCollection;
  /** Initial data for a step (a per-tag record for grouped steps) */
  getInitial: (step: string) => unknown;
  /** Persistent instance or queryset for a step (a per-tag record for grouped steps) */
  getInstance: (step: string) => unknown;
  /** Extra construction arguments for a step */
  getExtra: (step: string) => Readonly<Record<string, unknown>>;
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickTag(value: unknown, tag: string): unknown {
  return isRecord(value) ? (value[tag] ?? null) : null;
}

// =============================================================================
// Builder
// =============================================================================

export class FormSetBuilder {
  constructor(private readonly options: FormSetBuilderOptions) {}

  /**
   * Build the forms of a step.
   *
   * @param step - Step name
   * @param data - Payload to bind (null for unbound forms)
   * @param files - Files to bind (null for unbound forms)
   * @throws Error if the step is not declared
   */
  build(step: string, data: FormData | null, files: FormFiles | null): BuiltStepForms {
    const definition = this.options.steps.get(step);
    if (!definition) {
      throw new Error(`Unknown step "${step}"`);
    }
    return this.buildStep(definition, data, files);
  }

  private buildStep(
    definition: StepDefinition,
    data: FormData | null,
    files: FormFiles | null
  ): BuiltStepForms {
    const initial = this.options.getInitial(definition.name) ?? null;
    const instance = this.options.getInstance(definition.name) ?? null;
    const extra = this.options.getExtra(definition.name);
    const tags = new Map<WizardForm, string>();

    switch (definition.kind) {
      case 'single':
      case 'formset': {
        const formClass = definition.kind === 'single' ? definition.form : definition.formset;
        const form = construct(formClass, { data, files, prefix: definition.name, initial, extra }, instance);
        return { step: definition.name, forms: [form], tags };
      }
      case 'grouped': {
        const forms: WizardForm[] = [];
        for (const [tag, formClass] of definition.forms) {
          const form = construct(
            formClass,
            {
              data,
              files,
              prefix: `${definition.name}-${tag}`,
              initial: pickTag(initial, tag),
              extra,
            },
            pickTag(instance, tag)
          );
          tags.set(form, tag);
          forms.push(form);
        }
        return { step: definition.name, forms, tags };
      }
    }
  }
}

function construct(
  formClass: AnyFormClass,
  options: FormConstructionOptions,
  instance: unknown
): WizardForm {
  switch (getPersistentBinding(formClass)) {
    case 'instance':
      return formClass.create({ ...options, instance });
    case 'queryset':
      return formClass.create({ ...options, queryset: instance });
    default:
      return formClass.create(options);
  }
}
