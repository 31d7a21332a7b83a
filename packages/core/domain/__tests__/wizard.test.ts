/**
 * Wizard Domain Tests
 */

import { describe, it, expect } from 'vitest';
import { createEmptyState, normalizeWizardName } from '../wizard.js';
import {
  ConfigurationError,
  isClientWizardError,
  ManagementFormError,
  TamperedStateError,
  WizardErrorCode,
} from '../errors.js';

describe('normalizeWizardName', () => {
  it.each([
    ['CheckoutWizard', 'checkout_wizard'],
    ['contact', 'contact'],
    ['HTTPUploadWizard', 'http_upload_wizard'],
    ['signup-flow v2', 'signup_flow_v2'],
  ])('should normalize %s to %s', (name, expected) => {
    expect(normalizeWizardName(name)).toBe(expected);
  });
});

describe('createEmptyState', () => {
  it('should create independent empty records', () => {
    const first = createEmptyState();
    const second = createEmptyState();
    first.stepData['a'] = { 'a-name': 'x' };

    expect(second).toEqual({ step: null, stepData: {}, stepFiles: {}, extraData: {} });
  });
});

describe('wizard errors', () => {
  it('should format configuration errors with their details', () => {
    const error = new ConfigurationError('Invalid environment configuration', [
      'LOG_LEVEL: Invalid enum value',
      'REDIS_URL: Invalid url',
    ]);

    expect(error.format()).toBe(
      'Error: Invalid environment configuration\n' +
        '  - LOG_LEVEL: Invalid enum value\n' +
        '  - REDIS_URL: Invalid url'
    );
    expect(error.code).toBe(WizardErrorCode.CONFIGURATION);
  });

  it('should carry the missing management form code', () => {
    expect(new ManagementFormError().code).toBe('missing_management_form');
  });

  it('should classify client errors', () => {
    expect(isClientWizardError(new ManagementFormError())).toBe(true);
    expect(isClientWizardError(new TamperedStateError())).toBe(true);
    expect(isClientWizardError(new ConfigurationError('bad'))).toBe(false);
    expect(isClientWizardError(new Error('other'))).toBe(false);
  });
});
