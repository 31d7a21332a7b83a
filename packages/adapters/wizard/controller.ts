/**
 * WizardController
 *
 * Drives one wizard over a request-scoped storage. Hosts load the storage,
 * hand the request to `handleGet` / `handlePost`, then commit the storage.
 *
 * POST flow:
 * 1. `wizard_goto_step` naming an active step jumps there, unvalidated
 * 2. The management marker declares the step the client is on
 * 3. The step's forms are bound and validated
 * 4. Valid: the payload is stored and the wizard advances or finalizes
 * 5. Invalid: the step is rendered with errors
 */

import type { Logger } from 'pino';
import {
  ConfigurationError,
  getActiveSteps,
  GOTO_STEP_FIELD,
  ManagementFormError,
  StepNavigator,
} from '@stepwise/core/domain';
import type {
  FormData,
  FormFiles,
  IWizardRedirector,
  IWizardRenderer,
  IWizardStorage,
  WizardContext,
  WizardForm,
  WizardRequest,
} from '@stepwise/core/ports';
import { firstValue } from '../forms/zod-form.js';
import type { FinalStepResult, WizardConfig } from './config.js';
import { FormSetBuilder, type BuiltStepForms } from './form-set-builder.js';
import { buildManagementForm, readManagementForm } from './management-form.js';
import { InPlaceTransitions, type StepTransitionStrategy } from './transitions.js';

// =============================================================================
// Types
// =============================================================================

export interface WizardControllerOptions<R> {
  config: WizardConfig<R>;
  /** Storage loaded for this request */
  storage: IWizardStorage;
  renderer: IWizardRenderer<R>;
  /** Required by redirecting transitions and completion handlers that redirect */
  redirector?: IWizardRedirector<R>;
  logger: Logger;
  /** Transition strategy (default: in-place rendering) */
  transitions?: StepTransitionStrategy<R>;
}

function allValid(forms: WizardForm[]): boolean {
  // Validate every form so each carries its errors
  return forms.map((form) => form.isValid()).every(Boolean);
}

function boundData(forms: WizardForm[]): FormData | null {
  const [first] = forms;
  return first?.data ?? null;
}

function boundFiles(forms: WizardForm[]): FormFiles | null {
  const [first] = forms;
  return first?.files ?? null;
}

// =============================================================================
// Implementation
// =============================================================================

export class WizardController<R> {
  readonly config: WizardConfig<R>;
  readonly storage: IWizardStorage;
  readonly steps: StepNavigator;
  private readonly renderer: IWizardRenderer<R>;
  private readonly redirector: IWizardRedirector<R> | null;
  private readonly transitions: StepTransitionStrategy<R>;
  private readonly builder: FormSetBuilder;
  private readonly log: Logger;

  constructor(options: WizardControllerOptions<R>) {
    const { config } = options;
    this.config = config;
    this.storage = options.storage;
    this.renderer = options.renderer;
    this.redirector = options.redirector ?? null;
    this.transitions = options.transitions ?? new InPlaceTransitions<R>();
    this.log = options.logger.child({ component: 'WizardController', wizard: config.prefix });

    this.steps = new StepNavigator(
      () => this.getFormList(),
      () => this.storage.getCurrentStep()
    );

    const { hooks } = config;
    this.builder = new FormSetBuilder({
      steps: config.steps,
      getInitial: (step) =>
        hooks.getFormInitial ? hooks.getFormInitial(step, this) : config.initialDict[step],
      getInstance: (step) =>
        hooks.getFormInstance ? hooks.getFormInstance(step, this) : config.instanceDict[step],
      getExtra: (step) => hooks.getFormKwargs?.(step, this) ?? {},
    });
  }

  /**
   * Active step names, in declaration order.
   */
  getFormList(): string[] {
    return getActiveSteps(this.config.steps, this.config.conditionDict, this);
  }

  // ===========================================================================
  // Request Handlers
  // ===========================================================================

  /**
   * Start (or restart) the wizard on its first active step.
   */
  async handleGet(_request: WizardRequest): Promise<R> {
    this.storage.reset();
    const first = this.steps.first;
    this.storage.setCurrentStep(first);
    this.log.debug({ step: first }, 'Wizard started');
    return this.render(this.buildForms(first));
  }

  /**
   * Handle a step submission.
   *
   * @throws ManagementFormError if the management marker is missing or invalid
   */
  async handlePost(request: WizardRequest): Promise<R> {
    const active = this.getFormList();

    const gotoStep = firstValue(request.data[GOTO_STEP_FIELD]);
    if (gotoStep !== undefined && active.includes(gotoStep)) {
      this.log.debug({ from: this.steps.current, to: gotoStep }, 'Jumping to step');
      return this.transitions.goto(this, gotoStep);
    }

    const declared = readManagementForm(
      this.config.prefix,
      request.data,
      this.config.managementSecret
    );
    if (!active.includes(declared)) {
      this.log.warn({ declared }, 'Management marker names an unknown or inactive step');
      throw new ManagementFormError();
    }
    if (declared !== this.steps.current && this.storage.getCurrentStep() !== null) {
      this.log.info(
        { stored: this.steps.current, declared },
        'Following the step declared by the client'
      );
      this.storage.setCurrentStep(declared);
    }

    const step = this.steps.current;
    const built = this.buildForms(step, request.data, request.files);
    if (!allValid(built.forms)) {
      this.log.debug({ step }, 'Step submission is invalid');
      return this.render(built);
    }

    this.storage.setStepData(step, this.processStep(step, built.forms));
    this.storage.setStepFiles(step, this.processStepFiles(step, built.forms));

    const next = this.steps.next;
    if (step === this.steps.last || next === null) {
      return this.transitions.finalizeEntry(this, request);
    }
    this.log.debug({ step, next }, 'Step stored');
    return this.transitions.advance(this, next);
  }

  // ===========================================================================
  // Finalization
  // ===========================================================================

  /**
   * Revalidate every active step from storage and hand the results to the
   * completion handler. Storage is reset once the handler returns.
   */
  async finalize(request: WizardRequest): Promise<R> {
    const validated: BuiltStepForms[] = [];
    for (const step of this.getFormList()) {
      const built = this.buildForms(
        step,
        this.storage.getStepData(step),
        this.storage.getStepFiles(step)
      );
      if (!allValid(built.forms)) {
        this.log.info({ step }, 'Stored step failed revalidation');
        return this.transitions.revalidationFailure(this, step, built);
      }
      validated.push(built);
    }

    const formList: FinalStepResult[] = [];
    const formDict: Record<string, FinalStepResult> = {};
    for (const built of validated) {
      const result = this.toFinalResult(built);
      formList.push(result);
      formDict[built.step] = result;
    }

    const response = await this.config.done(formList, formDict, { wizard: this, request });
    this.storage.reset();
    this.log.info({ steps: validated.length }, 'Wizard completed');
    return response;
  }

  // ===========================================================================
  // Forms & Rendering
  // ===========================================================================

  /**
   * Build the forms of a step (the current step by default).
   */
  buildForms(
    step: string = this.steps.current,
    data: FormData | null = null,
    files: FormFiles | null = null
  ): BuiltStepForms {
    return this.builder.build(step, data, files);
  }

  /**
   * Make a step current and render it bound to its stored data.
   */
  showStep(step: string): R {
    this.storage.setCurrentStep(step);
    return this.render(
      this.buildForms(step, this.storage.getStepData(step), this.storage.getStepFiles(step))
    );
  }

  render(built: BuiltStepForms, extraContext: Readonly<Record<string, unknown>> = {}): R {
    return this.renderer.render(this.getContextData(built, extraContext));
  }

  getContextData(
    built: BuiltStepForms,
    extraContext: Readonly<Record<string, unknown>> = {}
  ): WizardContext {
    const { prefix, managementSecret, urlName } = this.config;
    const context: WizardContext = {
      ...this.storage.extraData,
      ...extraContext,
      wizard: {
        forms: built.forms,
        tags: built.forms.map((form) => built.tags.get(form) ?? null),
        steps: this.steps.toView(),
        managementForm: buildManagementForm(prefix, this.steps.current, managementSecret),
        ...(urlName !== null ? { urlName } : {}),
      },
    };
    return this.config.hooks.getContextData?.(context, this) ?? context;
  }

  /**
   * @throws ConfigurationError if no redirector was supplied
   */
  redirect(location: string): R {
    if (!this.redirector) {
      throw new ConfigurationError('A redirector is needed to redirect', [location]);
    }
    return this.redirector.redirect(location);
  }

  // ===========================================================================
  // Hooks
  // ===========================================================================

  private processStep(step: string, forms: WizardForm[]): FormData | null {
    const hook = this.config.hooks.processStep;
    return hook ? hook(step, forms, this) : boundData(forms);
  }

  private processStepFiles(step: string, forms: WizardForm[]): FormFiles | null {
    const hook = this.config.hooks.processStepFiles;
    return hook ? hook(step, forms, this) : boundFiles(forms);
  }

  private toFinalResult(built: BuiltStepForms): FinalStepResult {
    const definition = this.config.steps.get(built.step);
    if (definition?.kind !== 'grouped') {
      const [form] = built.forms;
      if (!form) {
        throw new Error(`Step "${built.step}" built no forms`);
      }
      return form;
    }
    const byTag: Record<string, WizardForm> = {};
    for (const form of built.forms) {
      const tag = built.tags.get(form);
      if (tag !== undefined) {
        byTag[tag] = form;
      }
    }
    return byTag;
  }
}
