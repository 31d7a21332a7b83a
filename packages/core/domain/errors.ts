/**
 * Wizard Error Types
 *
 * Typed errors raised by the wizard core. Configuration errors are raised while
 * a wizard is being declared and are never recovered from; the remaining
 * errors are fatal to the request that triggered them.
 *
 * @module packages/core/domain/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes carried by every wizard error.
 */
export enum WizardErrorCode {
  /** Structurally invalid wizard definition */
  CONFIGURATION = 'CONFIGURATION',
  /** A form declares a file field but no file storage is available */
  NO_FILE_STORAGE = 'NO_FILE_STORAGE',
  /** Management marker missing, malformed or forged */
  MISSING_MANAGEMENT_FORM = 'missing_management_form',
  /** Persisted wizard state failed its integrity check */
  TAMPERED_STATE = 'TAMPERED_STATE',
  /** Every step condition evaluated false */
  NO_ACTIVE_STEPS = 'NO_ACTIVE_STEPS',
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base class for all wizard errors.
 */
export class WizardError extends Error {
  constructor(
    message: string,
    public readonly code: WizardErrorCode
  ) {
    super(message);
    this.name = 'WizardError';
  }
}

/**
 * Raised while building a wizard definition.
 * The wizard must not be served until the definition is fixed.
 */
export class ConfigurationError extends WizardError {
  constructor(
    message: string,
    public readonly details: string[] = [],
    code: WizardErrorCode = WizardErrorCode.CONFIGURATION
  ) {
    super(message, code);
    this.name = 'ConfigurationError';
  }

  /**
   * Format the error with its details, one per line.
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    for (const detail of this.details) {
      lines.push(`  - ${detail}`);
    }
    return lines.join('\n');
  }
}

/**
 * A form with file fields was declared (or files were stored) without a
 * file storage backend.
 */
export class NoFileStorageConfiguredError extends ConfigurationError {
  constructor(message = "A 'fileStorage' is required in order to handle file uploads.") {
    super(message, [], WizardErrorCode.NO_FILE_STORAGE);
    this.name = 'NoFileStorageConfiguredError';
  }
}

/**
 * The posted management marker is missing or has been tampered with.
 * Surfaced to the caller as a client error; nothing is persisted.
 */
export class ManagementFormError extends WizardError {
  constructor(message = 'ManagementForm data is missing or has been tampered.') {
    super(message, WizardErrorCode.MISSING_MANAGEMENT_FORM);
    this.name = 'ManagementFormError';
  }
}

/**
 * Client-held wizard state failed signature verification.
 */
export class TamperedStateError extends WizardError {
  constructor(message = 'Wizard state has been manipulated.') {
    super(message, WizardErrorCode.TAMPERED_STATE);
    this.name = 'TamperedStateError';
  }
}

/**
 * Step conditions left no step to show.
 */
export class NoActiveStepsError extends WizardError {
  constructor(message = 'Wizard has no active steps') {
    super(message, WizardErrorCode.NO_ACTIVE_STEPS);
    this.name = 'NoActiveStepsError';
  }
}

/**
 * Check whether an error should be reported to the client as a bad request.
 */
export function isClientWizardError(error: unknown): error is ManagementFormError | TamperedStateError {
  return error instanceof ManagementFormError || error instanceof TamperedStateError;
}
