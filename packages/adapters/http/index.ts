/**
 * HTTP Adapters
 *
 * express binding of the wizard controllers.
 */

export {
  createWizardRouter,
  cookieStorageFactory,
  sessionStorageFactory,
  toFormData,
  toWizardRequest,
  sendWizardResponse,
  getHttpStatus,
  redirectResponses,
  SESSION_COOKIE_NAME,
  type HttpResponse,
  type StorageFactory,
  type WizardRouterDeps,
  type SessionStorageFactoryOptions,
  type CookieStorageFactoryOptions,
} from './express-router.js';

export { createWizardApp, type MountedWizard, type WizardApp, type WizardAppOptions } from './app.js';
