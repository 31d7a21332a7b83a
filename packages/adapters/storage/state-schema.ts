/**
 * Wizard State Schema
 *
 * zod schema for the serialized wizard state. Stored state is parsed through it
 * on every load, so a corrupted or foreign payload never reaches the wizard.
 */

import { z } from 'zod';
import type { WizardStateData } from '@stepwise/core/domain';

const FormValueSchema = z.union([z.string(), z.array(z.string())]);

export const StoredFileRefSchema = z.object({
  tmpName: z.string().min(1),
  name: z.string(),
  contentType: z.string(),
  size: z.number().int().nonnegative(),
});

export const WizardStateDataSchema = z.object({
  step: z.string().nullable(),
  stepData: z.record(z.record(FormValueSchema)),
  stepFiles: z.record(z.record(StoredFileRefSchema)),
  extraData: z.record(z.unknown()),
});

/**
 * Parse serialized wizard state.
 *
 * @param serialized - JSON text
 * @returns The state, or null if the text is not valid wizard state
 */
export function parseWizardState(serialized: string): WizardStateData | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(serialized);
  } catch {
    return null;
  }
  const result = WizardStateDataSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
