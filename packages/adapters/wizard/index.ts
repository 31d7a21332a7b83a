/**
 * Wizard Adapters
 *
 * Exports the wizard controllers and their collaborators:
 * - configureWizard - validated wizard definition
 * - WizardController - in-place wizard over one address
 * - NamedUrlWizardController - one address per step
 * - FormSetBuilder - per-request form construction
 */

// Configuration
export {
  configureWizard,
  defaultStepUrl,
  type WizardOptions,
  type WizardConfig,
  type WizardHooks,
  type DoneHandler,
  type FinalizeContext,
  type FinalStepResult,
} from './config.js';

// Controllers
export { WizardController, type WizardControllerOptions } from './controller.js';
export {
  NamedUrlWizardController,
  type NamedUrlWizardControllerOptions,
} from './named-url-controller.js';

// Transitions
export {
  InPlaceTransitions,
  RedirectTransitions,
  type StepTransitionStrategy,
} from './transitions.js';

// Forms & Management Marker
export { FormSetBuilder, type BuiltStepForms, type FormSetBuilderOptions } from './form-set-builder.js';
export {
  buildManagementForm,
  readManagementForm,
  CURRENT_STEP_FIELD,
  SIGNATURE_FIELD,
} from './management-form.js';
