/**
 * Form Adapters
 *
 * zod-backed implementations of the form construction port:
 * - defineForm - single forms (plain or instance-bound)
 * - defineFormSet - formsets repeating an item form
 */

export {
  ZodForm,
  defineForm,
  fileField,
  isUploadedFile,
  addPrefix,
  firstValue,
  type ZodFormClass,
} from './zod-form.js';

export {
  ZodFormSet,
  defineFormSet,
  TOTAL_FORMS_FIELD,
  INITIAL_FORMS_FIELD,
  type ZodFormSetClass,
  type ZodFormSetOptions,
} from './zod-formset.js';
