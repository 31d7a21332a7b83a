/**
 * Step Collection Builder
 *
 * Normalizes a declared form list into the ordered step collection used by
 * every request. All structural checks happen here so that an invalid wizard
 * fails when it is declared, never while serving a request.
 *
 * @module packages/core/domain/step-collection
 */

import type { IFileStorage } from '../ports/file-storage.js';
import { getBaseForm, isAnyFormClass, isFormSetClass, type AnyFormClass } from '../ports/form.js';
import { ConfigurationError, NoFileStorageConfiguredError } from './errors.js';
import {
  getStepFormClasses,
  type FormListEntry,
  type StepCollection,
  type StepDefinition,
  type TaggedForms,
} from './wizard.js';

/**
 * Options for building a step collection.
 */
export interface BuildStepCollectionOptions {
  /** File storage available to the wizard (required for file fields) */
  fileStorage?: IFileStorage | null;
}

/**
 * Build the ordered step collection for a form list.
 *
 * @param formList - Declared steps
 * @param options - Build options
 * @returns Ordered step collection
 * @throws ConfigurationError for an empty list, duplicate or malformed steps
 * @throws NoFileStorageConfiguredError for file fields without file storage
 */
export function buildStepCollection(
  formList: readonly FormListEntry[],
  options: BuildStepCollectionOptions = {}
): StepCollection {
  if (formList.length === 0) {
    throw new ConfigurationError('At least one form is needed');
  }

  const steps = new Map<string, StepDefinition>();

  formList.forEach((entry, index) => {
    const definition = toStepDefinition(entry, index);
    if (steps.has(definition.name)) {
      throw new ConfigurationError(`Duplicate step name "${definition.name}"`, [
        `Entry ${index} reuses a step name already declared`,
      ]);
    }
    steps.set(definition.name, definition);
  });

  if (!options.fileStorage) {
    for (const definition of steps.values()) {
      for (const formClass of getStepFormClasses(definition)) {
        const fileField = findFileField(formClass);
        if (fileField) {
          throw new NoFileStorageConfiguredError(
            `Step "${definition.name}" declares file field "${fileField}"; ` +
              "a 'fileStorage' is required in order to handle file uploads."
          );
        }
      }
    }
  }

  return steps;
}

// =============================================================================
// Helpers
// =============================================================================

function toStepDefinition(entry: FormListEntry, index: number): StepDefinition {
  if (isAnyFormClass(entry)) {
    return classToStep(String(index), entry);
  }

  const [rawName, payload] = entry;
  const name = String(rawName);
  if (name.length === 0) {
    throw new ConfigurationError(`Step name at entry ${index} is empty`);
  }

  if (isAnyFormClass(payload)) {
    return classToStep(name, payload);
  }
  return groupedStep(name, payload);
}

function classToStep(name: string, formClass: AnyFormClass): StepDefinition {
  if (isFormSetClass(formClass)) {
    return { kind: 'formset', name, formset: formClass };
  }
  return { kind: 'single', name, form: formClass };
}

function groupedStep(name: string, taggedForms: TaggedForms): StepDefinition {
  const forms = new Map<string, AnyFormClass>();
  for (const [tag, formClass] of Object.entries(taggedForms)) {
    if (!isAnyFormClass(formClass)) {
      throw new ConfigurationError(`Step "${name}" declares an invalid form for tag "${tag}"`);
    }
    forms.set(tag, formClass);
  }
  if (forms.size === 0) {
    throw new ConfigurationError(`Step "${name}" declares no tagged forms`);
  }
  return { kind: 'grouped', name, forms };
}

function findFileField(formClass: AnyFormClass): string | null {
  const base = getBaseForm(formClass);
  for (const [fieldName, field] of Object.entries(base.baseFields)) {
    if (field.kind === 'file') {
      return fieldName;
    }
  }
  return null;
}
