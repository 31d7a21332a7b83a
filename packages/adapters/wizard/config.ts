/**
 * Wizard Configuration
 *
 * Validates a wizard definition once, up front, and freezes it. Every
 * definition error (empty form list, duplicate steps, file fields without
 * file storage, a bad URL name) surfaces here, before any request is served.
 */

import {
  buildStepCollection,
  ConfigurationError,
  DEFAULT_DONE_STEP_NAME,
  normalizeWizardName,
  type ConditionDict,
  type FormListEntry,
  type StepCollection,
} from '@stepwise/core/domain';
import type {
  FormData,
  FormFiles,
  IFileStorage,
  WizardContext,
  WizardForm,
  WizardRequest,
} from '@stepwise/core/ports';
import type { WizardController } from './controller.js';

// =============================================================================
// Types
// =============================================================================

/**
 * The validated result of one step: its form, or its forms keyed by tag for
 * grouped steps.
 */
export type FinalStepResult = WizardForm | Readonly<Record<string, WizardForm>>;

/**
 * Context passed to the completion handler.
 */
export interface FinalizeContext<R> {
  wizard: WizardController<R>;
  request: WizardRequest;
}

/**
 * Completion handler. Receives the validated results in step order and keyed
 * by step name.
 */
export type DoneHandler<R> = (
  formList: FinalStepResult[],
  formDict: Readonly<Record<string, FinalStepResult>>,
  context: FinalizeContext<R>
) => R | Promise<R>;

/**
 * Per-wizard customization points.
 */
export interface WizardHooks<R> {
  /** Initial data for a step; defaults to `initialDict[step]` */
  getFormInitial?: (step: string, wizard: WizardController<R>) => unknown;
  /** Persistent instance for a step; defaults to `instanceDict[step]` */
  getFormInstance?: (step: string, wizard: WizardController<R>) => unknown;
  /** Extra construction arguments for a step's forms */
  getFormKwargs?: (step: string, wizard: WizardController<R>) => Readonly<Record<string, unknown>>;
  /** Payload to store for a validated step; defaults to the bound data */
  processStep?: (step: string, forms: WizardForm[], wizard: WizardController<R>) => FormData | null;
  /** Files to store for a validated step; defaults to the bound files */
  processStepFiles?: (
    step: string,
    forms: WizardForm[],
    wizard: WizardController<R>
  ) => FormFiles | null;
  /** Final say on the render context */
  getContextData?: (context: WizardContext, wizard: WizardController<R>) => WizardContext;
}

/**
 * Declared wizard definition.
 */
export interface WizardOptions<R> {
  /** Wizard name; normalized into the prefix of its marker and storage keys */
  name: string;
  formList: readonly FormListEntry[];
  initialDict?: Readonly<Record<string, unknown>>;
  instanceDict?: Readonly<Record<string, unknown>>;
  conditionDict?: ConditionDict<WizardController<R>>;
  fileStorage?: IFileStorage | null;
  /** Route name of a named-URL wizard */
  urlName?: string;
  /** Address of the terminal step of a named-URL wizard (default: `done`) */
  doneStepName?: string;
  /** Builds the address of a step (default: `/<urlName>/<step>`) */
  stepUrl?: (urlName: string, step: string) => string;
  /** Signs the management marker when set */
  managementSecret?: string | null;
  done: DoneHandler<R>;
  hooks?: WizardHooks<R>;
}

/**
 * Validated, frozen wizard definition.
 */
export interface WizardConfig<R> {
  readonly name: string;
  readonly prefix: string;
  readonly steps: StepCollection;
  readonly initialDict: Readonly<Record<string, unknown>>;
  readonly instanceDict: Readonly<Record<string, unknown>>;
  readonly conditionDict: ConditionDict<WizardController<R>>;
  readonly fileStorage: IFileStorage | null;
  readonly urlName: string | null;
  readonly doneStepName: string;
  readonly stepUrl: (urlName: string, step: string) => string;
  readonly managementSecret: string | null;
  readonly done: DoneHandler<R>;
  readonly hooks: WizardHooks<R>;
}

export function defaultStepUrl(urlName: string, step: string): string {
  return `/${encodeURIComponent(urlName)}/${encodeURIComponent(step)}`;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Validate and freeze a wizard definition.
 *
 * @throws ConfigurationError if the definition is invalid
 * @throws NoFileStorageConfiguredError if a file field has no file storage
 */
export function configureWizard<R>(options: WizardOptions<R>): WizardConfig<R> {
  const prefix = normalizeWizardName(options.name);
  if (!prefix) {
    throw new ConfigurationError('Wizard name is needed', [`"${options.name}" normalizes to nothing`]);
  }

  const fileStorage = options.fileStorage ?? null;
  const steps = buildStepCollection(options.formList, { fileStorage });

  const urlName = options.urlName ?? null;
  if (urlName !== null && urlName.trim() === '') {
    throw new ConfigurationError('URL name is needed to resolve correct wizard URLs');
  }

  const doneStepName = options.doneStepName ?? DEFAULT_DONE_STEP_NAME;
  if (urlName !== null && steps.has(doneStepName)) {
    throw new ConfigurationError(`Step name "${doneStepName}" is reserved for the "done" view`);
  }

  const conditionDict = options.conditionDict ?? {};

  return Object.freeze({
    name: options.name,
    prefix,
    steps,
    initialDict: options.initialDict ?? {},
    instanceDict: options.instanceDict ?? {},
    conditionDict,
    fileStorage,
    urlName,
    doneStepName,
    stepUrl: options.stepUrl ?? defaultStepUrl,
    managementSecret: options.managementSecret ?? null,
    done: options.done,
    hooks: options.hooks ?? {},
  });
}
