/**
 * Request & Response Ports
 *
 * The wizard never touches HTTP directly. Hosts translate their request into a
 * `WizardRequest` and supply a renderer and a redirector that produce the
 * host's own response representation `R`.
 *
 * @module packages/core/ports/responses
 */

import type { FormData, FormFiles, WizardForm } from './form.js';

/**
 * A request as seen by the wizard.
 */
export interface WizardRequest {
  method: 'GET' | 'POST';
  /** Submitted field values (empty for GET) */
  data: FormData;
  /** Uploaded files (empty for GET) */
  files: FormFiles;
  /** Query string parameters, in order */
  query: ReadonlyArray<readonly [string, string]>;
  /** Step address carried by the request (named-URL wizards) */
  stepParam?: string | null;
}

/**
 * Snapshot of step navigation exposed to templates.
 */
export interface StepsView {
  all: string[];
  count: number;
  current: string;
  first: string;
  last: string;
  next: string | null;
  prev: string | null;
  index: number;
  step0: number;
  step1: number;
}

/**
 * Hidden fields asserting which step the client is on.
 */
export interface ManagementFormView {
  prefix: string;
  currentStep: string;
  /** Hidden input names and values */
  fields: Record<string, string>;
}

/**
 * Context handed to the renderer.
 */
export interface WizardContext {
  /** Extra data and host-supplied context entries */
  [key: string]: unknown;
  wizard: {
    forms: WizardForm[];
    /** Tag of each form of a grouped step, in form order (null otherwise) */
    tags: Array<string | null>;
    steps: StepsView;
    managementForm: ManagementFormView;
    urlName?: string;
  };
}

/**
 * Produces the host response for a rendered step.
 */
export interface IWizardRenderer<R> {
  render(context: WizardContext): R;
}

/**
 * Produces the host response for a redirect.
 */
export interface IWizardRedirector<R> {
  redirect(location: string): R;
}
