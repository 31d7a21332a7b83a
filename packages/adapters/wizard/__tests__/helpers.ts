/**
 * Wizard test fixtures: forms, a recording renderer and an in-memory storage.
 */

import { vi } from 'vitest';
import { z } from 'zod';
import type { Logger } from 'pino';
import type {
  FormData,
  IFileStorage,
  IWizardRedirector,
  IWizardRenderer,
  WizardContext,
  WizardRequest,
} from '@stepwise/core/ports';
import { defineForm, fileField } from '../../forms/zod-form.js';
import { MemorySessionStore, SessionWizardStorage } from '../../storage/session-storage.js';
import type { FinalStepResult } from '../config.js';

// =============================================================================
// Forms
// =============================================================================

export const ContactForm = defineForm('ContactForm', { name: z.string().min(1) });
export const AddressForm = defineForm('AddressForm', { city: z.string().min(1) });
export const FirstNameForm = defineForm('FirstNameForm', { first: z.string().min(1) });
export const NicknameForm = defineForm('NicknameForm', { nick: z.string().min(1) });
export const UploadForm = defineForm('UploadForm', { doc: fileField() });

// =============================================================================
// Responses
// =============================================================================

export type TestResponse =
  | { kind: 'render'; context: WizardContext }
  | { kind: 'redirect'; location: string }
  | {
      kind: 'done';
      formList: FinalStepResult[];
      formDict: Readonly<Record<string, FinalStepResult>>;
    };

export const renderer: IWizardRenderer<TestResponse> = {
  render: (context) => ({ kind: 'render', context }),
};

export const redirector: IWizardRedirector<TestResponse> = {
  redirect: (location) => ({ kind: 'redirect', location }),
};

export function renderedContext(response: TestResponse): WizardContext {
  if (response.kind !== 'render') {
    throw new Error(`Expected a rendered step, got ${response.kind}`);
  }
  return response.context;
}

export function redirectLocation(response: TestResponse): string {
  if (response.kind !== 'redirect') {
    throw new Error(`Expected a redirect, got ${response.kind}`);
  }
  return response.location;
}

// =============================================================================
// Requests
// =============================================================================

export const PREFIX = 'test_wizard';

export function getRequest(
  stepParam: string | null = null,
  query: Array<[string, string]> = []
): WizardRequest {
  return { method: 'GET', data: {}, files: {}, query, stepParam };
}

export function postRequest(data: FormData, stepParam: string | null = null): WizardRequest {
  return { method: 'POST', data, files: {}, query: [], stepParam };
}

/**
 * A step submission carrying the management marker.
 */
export function submitStep(step: string, fields: FormData, stepParam: string | null = null) {
  return postRequest({ [`${PREFIX}-current_step`]: step, ...fields }, stepParam);
}

// =============================================================================
// Collaborators
// =============================================================================

export const createMockLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  child: vi.fn().mockReturnThis(),
});

export function createStorage(
  logger: ReturnType<typeof createMockLogger>,
  fileStorage: IFileStorage | null = null
) {
  return new SessionWizardStorage({
    redis: new MemorySessionStore(),
    logger: logger as unknown as Logger,
    prefix: PREFIX,
    sessionId: 'session-1',
    fileStorage,
  });
}
