/**
 * NamedUrlWizardController
 *
 * A wizard whose steps each have an address. Every transition redirects to
 * the target step's address; the terminal `done` address finalizes.
 *
 *   GET  /<urlName>              → redirect to the current step
 *   GET  /<urlName>?reset        → restart, redirect to the first step
 *   GET  /<urlName>/<step>       → render the step
 *   GET  /<urlName>/done         → finalize
 *   POST /<urlName>/<step>       → submit, redirect to the next address
 */

import type { Logger } from 'pino';
import { ConfigurationError } from '@stepwise/core/domain';
import type { IWizardRedirector, IWizardStorage, WizardRequest } from '@stepwise/core/ports';
import { WizardController, type WizardControllerOptions } from './controller.js';
import { RedirectTransitions } from './transitions.js';

export interface NamedUrlWizardControllerOptions<R>
  extends Omit<WizardControllerOptions<R>, 'transitions' | 'redirector'> {
  redirector: IWizardRedirector<R>;
}

export class NamedUrlWizardController<R> {
  readonly wizard: WizardController<R>;
  readonly urlName: string;
  readonly doneStepName: string;
  private readonly log: Logger;

  /**
   * @throws ConfigurationError if the wizard has no URL name, or a step is
   *   named like the done address
   */
  constructor(options: NamedUrlWizardControllerOptions<R>) {
    const { config } = options;
    if (!config.urlName) {
      throw new ConfigurationError('URL name is needed to resolve correct wizard URLs');
    }
    if (config.steps.has(config.doneStepName)) {
      throw new ConfigurationError(
        `Step name "${config.doneStepName}" is reserved for the "done" view`
      );
    }

    this.urlName = config.urlName;
    this.doneStepName = config.doneStepName;
    this.log = options.logger.child({
      component: 'NamedUrlWizardController',
      wizard: config.prefix,
    });
    this.wizard = new WizardController({
      ...options,
      transitions: new RedirectTransitions<R>((step) => this.stepUrl(step), config.doneStepName),
    });
  }

  get storage(): IWizardStorage {
    return this.wizard.storage;
  }

  /**
   * Address of a step (or of the done view).
   */
  stepUrl(step: string): string {
    return this.wizard.config.stepUrl(this.urlName, step);
  }

  async handleGet(request: WizardRequest): Promise<R> {
    const { wizard } = this;
    const step = request.stepParam ?? null;

    if (step === null) {
      if (request.query.some(([key]) => key === 'reset')) {
        wizard.storage.reset();
        wizard.storage.setCurrentStep(wizard.steps.first);
        this.log.debug('Wizard restarted');
      }
      const query = new URLSearchParams(
        request.query.map(([key, value]): [string, string] => [key, value])
      ).toString();
      const location = this.stepUrl(wizard.steps.current);
      return wizard.redirect(query ? `${location}?${query}` : location);
    }

    if (step === this.doneStepName) {
      return wizard.finalize(request);
    }

    if (wizard.getFormList().includes(step)) {
      return wizard.showStep(step);
    }

    this.log.debug({ step }, 'Unknown step address, restarting at the first step');
    const first = wizard.steps.first;
    wizard.storage.setCurrentStep(first);
    return wizard.redirect(this.stepUrl(first));
  }

  handlePost(request: WizardRequest): Promise<R> {
    return this.wizard.handlePost(request);
  }
}
