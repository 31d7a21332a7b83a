/**
 * Management Marker
 *
 * Hidden fields posted with every step asserting which step the client is on:
 * `<prefix>-current_step`, plus `<prefix>-signature` when the wizard has a
 * signing secret. A missing, malformed or forged marker is fatal to the request.
 */

import { z } from 'zod';
import { ManagementFormError } from '@stepwise/core/domain';
import type { FormData, ManagementFormView } from '@stepwise/core/ports';
import { firstValue } from '../forms/zod-form.js';
import { signature, verifySignature } from '../storage/signing.js';

export const CURRENT_STEP_FIELD = 'current_step';
export const SIGNATURE_FIELD = 'signature';

const ManagementPayloadSchema = z.object({
  [CURRENT_STEP_FIELD]: z.string().min(1),
  [SIGNATURE_FIELD]: z.string().min(1).optional(),
});

function signedValue(prefix: string, step: string): string {
  return `${prefix}:${step}`;
}

/**
 * Build the management marker for the step being rendered.
 *
 * @param prefix - Wizard prefix
 * @param currentStep - Step being rendered
 * @param secret - Signing secret, if the wizard signs its marker
 */
export function buildManagementForm(
  prefix: string,
  currentStep: string,
  secret: string | null
): ManagementFormView {
  const fields: Record<string, string> = {
    [`${prefix}-${CURRENT_STEP_FIELD}`]: currentStep,
  };
  if (secret) {
    fields[`${prefix}-${SIGNATURE_FIELD}`] = signature(signedValue(prefix, currentStep), secret);
  }
  return { prefix, currentStep, fields };
}

/**
 * Read the step the client declares as current.
 *
 * @param prefix - Wizard prefix
 * @param data - Submitted payload
 * @param secret - Signing secret, if the wizard signs its marker
 * @returns Declared step name
 * @throws ManagementFormError if the marker is missing, malformed or forged
 */
export function readManagementForm(prefix: string, data: FormData, secret: string | null): string {
  const result = ManagementPayloadSchema.safeParse({
    [CURRENT_STEP_FIELD]: firstValue(data[`${prefix}-${CURRENT_STEP_FIELD}`]),
    [SIGNATURE_FIELD]: firstValue(data[`${prefix}-${SIGNATURE_FIELD}`]),
  });
  if (!result.success) {
    throw new ManagementFormError();
  }

  const step = result.data[CURRENT_STEP_FIELD];
  if (secret) {
    const candidate = result.data[SIGNATURE_FIELD];
    if (!candidate || !verifySignature(signedValue(prefix, step), candidate, secret)) {
      throw new ManagementFormError();
    }
  }
  return step;
}
