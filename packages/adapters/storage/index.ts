/**
 * Storage Adapters
 *
 * Wizard state backends and temporary file storage:
 * - SessionWizardStorage - server-side state in Redis (or process memory)
 * - CookieWizardStorage - client-held state in a signed cookie
 * - MemoryFileStorage / LocalFileStorage - uploaded files between requests
 */

export { BaseWizardStorage, type WizardStorageOptions } from './base-storage.js';

export {
  SessionWizardStorage,
  MemorySessionStore,
  openSessionStorage,
  createSessionStore,
  type RedisClient,
  type SessionWizardStorageOptions,
} from './session-storage.js';

export { CookieWizardStorage, type CookieWizardStorageOptions } from './cookie-storage.js';

export { MemoryFileStorage, LocalFileStorage } from './file-storage.js';

export { sign, unsign, signature, verifySignature } from './signing.js';

export { parseWizardState, WizardStateDataSchema, StoredFileRefSchema } from './state-schema.js';
