/**
 * Step Transitions
 *
 * How the controller moves between steps. The in-place wizard answers every
 * request by rendering; the named-URL wizard answers by redirecting to the
 * address of the target step.
 */

import type { WizardRequest } from '@stepwise/core/ports';
import type { WizardController } from './controller.js';
import type { BuiltStepForms } from './form-set-builder.js';

export interface StepTransitionStrategy<R> {
  /** A step validated and another follows */
  advance(wizard: WizardController<R>, nextStep: string): R;
  /** The client asked to jump to a step */
  goto(wizard: WizardController<R>, step: string): R;
  /** Finalization found an invalid step */
  revalidationFailure(wizard: WizardController<R>, step: string, built: BuiltStepForms): R;
  /** The last step validated */
  finalizeEntry(wizard: WizardController<R>, request: WizardRequest): Promise<R>;
}

/**
 * Render every transition in the response to the current request.
 */
export class InPlaceTransitions<R> implements StepTransitionStrategy<R> {
  advance(wizard: WizardController<R>, nextStep: string): R {
    return wizard.showStep(nextStep);
  }

  goto(wizard: WizardController<R>, step: string): R {
    return wizard.showStep(step);
  }

  revalidationFailure(wizard: WizardController<R>, step: string, built: BuiltStepForms): R {
    wizard.storage.setCurrentStep(step);
    return wizard.render(built);
  }

  finalizeEntry(wizard: WizardController<R>, request: WizardRequest): Promise<R> {
    return wizard.finalize(request);
  }
}

/**
 * Redirect to the address of the target step.
 */
export class RedirectTransitions<R> implements StepTransitionStrategy<R> {
  constructor(
    private readonly stepUrl: (step: string) => string,
    private readonly doneStepName: string
  ) {}

  advance(wizard: WizardController<R>, nextStep: string): R {
    wizard.storage.setCurrentStep(nextStep);
    return wizard.redirect(this.stepUrl(nextStep));
  }

  goto(wizard: WizardController<R>, step: string): R {
    wizard.storage.setCurrentStep(step);
    return wizard.redirect(this.stepUrl(step));
  }

  revalidationFailure(wizard: WizardController<R>, step: string): R {
    wizard.storage.setCurrentStep(step);
    return wizard.redirect(this.stepUrl(step));
  }

  async finalizeEntry(wizard: WizardController<R>, request: WizardRequest): Promise<R> {
    if (request.stepParam === this.doneStepName) {
      return wizard.finalize(request);
    }
    return wizard.redirect(this.stepUrl(this.doneStepName));
  }
}
