/**
 * IWizardStorage Interface
 *
 * Port for the durable record of a wizard traversal: the current step, the
 * payload and files each step validated against, and free-form extra data.
 *
 * Implementations load the record before a request is handled and persist it
 * afterwards (`IPersistentWizardStorage`); the operations below are
 * synchronous reads and writes on the loaded record. There is no locking:
 * concurrent requests on the same record are last-write-wins.
 *
 * @module packages/core/ports/wizard-storage
 */

import type { FormData, FormFiles } from './form.js';

// =============================================================================
// IWizardStorage Interface
// =============================================================================

/**
 * Port interface for wizard state storage.
 */
export interface IWizardStorage {
  /** Prefix isolating this wizard's state from other wizards */
  readonly prefix: string;

  /**
   * Free-form data shared across steps.
   * Mutations are persisted with the rest of the state.
   */
  extraData: Record<string, unknown>;

  /**
   * Get the current step, or null before the wizard starts.
   */
  getCurrentStep(): string | null;

  /**
   * Set the current step.
   */
  setCurrentStep(step: string | null): void;

  /**
   * Get the payload stored for a step.
   *
   * @returns Stored payload or null if the step has none
   */
  getStepData(step: string): FormData | null;

  /**
   * Store the payload for a step. Passing null removes it.
   */
  setStepData(step: string, data: FormData | null): void;

  /**
   * Get the files stored for a step.
   *
   * @returns Stored files or null if the step has none
   * @throws NoFileStorageConfiguredError if files are recorded but no file storage exists
   */
  getStepFiles(step: string): FormFiles | null;

  /**
   * Store the files for a step.
   *
   * @throws NoFileStorageConfiguredError if files are given but no file storage exists
   */
  setStepFiles(step: string, files: FormFiles | null): void;

  /**
   * Payload stored for the current step.
   */
  getCurrentStepData(): FormData | null;

  /**
   * Files stored for the current step.
   */
  getCurrentStepFiles(): FormFiles | null;

  /**
   * Clear the current step, every step's payload and files, and extra data.
   * Deletes temporary files referenced by the state.
   */
  reset(): void;
}

/**
 * Storage whose record is persisted once a request has been handled.
 */
export interface IPersistentWizardStorage extends IWizardStorage {
  /**
   * Persist the record.
   */
  commit(): Promise<void>;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Default session TTL in seconds (15 minutes).
 */
export const DEFAULT_STATE_TTL_SECONDS = 15 * 60;

/**
 * Maximum session TTL in seconds (1 hour).
 */
export const MAX_STATE_TTL_SECONDS = 60 * 60;

/**
 * Key prefixes for server-side state.
 */
export const STATE_KEY_PREFIXES = {
  /** Wizard state: wizard:state:{sessionId}:{prefix} */
  STATE: 'wizard:state:',
} as const;
