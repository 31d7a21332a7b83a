/**
 * Wizard Router
 *
 * Binds a wizard to express. Each request opens the wizard storage, runs the
 * controller, commits the storage and sends the controller's response.
 *
 * Routes:
 *   GET  /         start (in-place) or redirect to the current step (named URLs)
 *   POST /         submit a step
 *   GET  /:step    render a step, or finalize at the done address (named URLs)
 *   POST /:step    submit a step (named URLs)
 *
 * @module packages/adapters/http/express-router
 */

import * as crypto from 'crypto';
import express, {
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
  type Router,
} from 'express';
import type { Logger } from 'pino';
import { isClientWizardError, WizardErrorCode } from '@stepwise/core/domain';
import type {
  FormData,
  FormFiles,
  IFileStorage,
  IPersistentWizardStorage,
  IWizardRedirector,
  IWizardRenderer,
  WizardRequest,
} from '@stepwise/core/ports';
import { CookieWizardStorage } from '../storage/cookie-storage.js';
import { SessionWizardStorage, type RedisClient } from '../storage/session-storage.js';
import { NamedUrlWizardController } from '../wizard/named-url-controller.js';
import { WizardController } from '../wizard/controller.js';
import type { WizardConfig } from '../wizard/config.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Response produced by the wizard for express.
 */
export type HttpResponse =
  | { kind: 'html'; status: number; body: string }
  | { kind: 'json'; status: number; body: unknown }
  | { kind: 'redirect'; location: string };

/**
 * Opens (loads) the wizard storage for one request.
 */
export type StorageFactory = (req: Request, res: Response) => Promise<IPersistentWizardStorage>;

/**
 * Dependencies for the wizard router factory
 */
export interface WizardRouterDeps {
  config: WizardConfig<HttpResponse>;
  openStorage: StorageFactory;
  renderer: IWizardRenderer<HttpResponse>;
  logger: Logger;
  /** Extracts uploaded files; requests carry none by default */
  readFiles?: (req: Request) => FormFiles;
}

export const redirectResponses: IWizardRedirector<HttpResponse> = {
  redirect: (location) => ({ kind: 'redirect', location }),
};

// =============================================================================
// Request & Response Mapping
// =============================================================================

/**
 * Keep the string values of a parsed urlencoded body.
 */
export function toFormData(body: unknown): FormData {
  const data: FormData = {};
  if (typeof body !== 'object' || body === null) {
    return data;
  }
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      data[key] = value;
    } else if (Array.isArray(value)) {
      data[key] = value.filter((item): item is string => typeof item === 'string');
    }
  }
  return data;
}

/**
 * Translate an express request into a wizard request.
 */
export function toWizardRequest(
  req: Request,
  stepParam: string | null,
  files: FormFiles = {}
): WizardRequest {
  const url = new URL(req.originalUrl, 'http://localhost');
  return {
    method: req.method === 'POST' ? 'POST' : 'GET',
    data: req.method === 'POST' ? toFormData(req.body) : {},
    files: req.method === 'POST' ? files : {},
    query: [...url.searchParams.entries()],
    stepParam,
  };
}

export function sendWizardResponse(res: Response, response: HttpResponse): void {
  switch (response.kind) {
    case 'redirect':
      res.redirect(302, response.location);
      return;
    case 'html':
      res.status(response.status).type('html').send(response.body);
      return;
    case 'json':
      res.status(response.status).json(response.body);
      return;
  }
}

/**
 * Map wizard error codes to HTTP status codes
 */
export function getHttpStatus(code: WizardErrorCode): number {
  switch (code) {
    case WizardErrorCode.MISSING_MANAGEMENT_FORM:
    case WizardErrorCode.TAMPERED_STATE:
      return 400;
    case WizardErrorCode.CONFIGURATION:
    case WizardErrorCode.NO_FILE_STORAGE:
    case WizardErrorCode.NO_ACTIVE_STEPS:
    default:
      return 500;
  }
}

/**
 * Async handler wrapper
 */
function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

// =============================================================================
// Storage Factories
// =============================================================================

export const SESSION_COOKIE_NAME = 'wizard_session';

function readCookie(req: Request, name: string): string | undefined {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== 'object' || cookies === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(cookies, name);
  return typeof value === 'string' ? value : undefined;
}

export interface SessionStorageFactoryOptions {
  prefix: string;
  redis: RedisClient;
  logger: Logger;
  ttlSeconds?: number;
  fileStorage?: IFileStorage | null;
}

/**
 * Server-side state keyed by a session cookie, issued on first visit.
 */
export function sessionStorageFactory(options: SessionStorageFactoryOptions): StorageFactory {
  return async (req, res) => {
    let sessionId = readCookie(req, SESSION_COOKIE_NAME);
    if (!sessionId) {
      sessionId = crypto.randomUUID();
      res.cookie(SESSION_COOKIE_NAME, sessionId, { httpOnly: true, sameSite: 'lax' });
    }
    const storage = new SessionWizardStorage({ ...options, sessionId });
    await storage.load();
    return storage;
  };
}

export interface CookieStorageFactoryOptions {
  prefix: string;
  secret: string;
  logger: Logger;
  fileStorage?: IFileStorage | null;
}

/**
 * Client-held state in a signed cookie.
 */
export function cookieStorageFactory(options: CookieStorageFactoryOptions): StorageFactory {
  return async (req, res) => {
    const storage = new CookieWizardStorage({
      ...options,
      writeCookie: (name, value) => {
        res.cookie(name, value, { httpOnly: true, sameSite: 'lax' });
      },
    });
    storage.load(readCookie(req, storage.cookieName));
    return storage;
  };
}

// =============================================================================
// Router Factory
// =============================================================================

/**
 * Create the express router of a wizard
 *
 * @param deps - Wizard definition, storage factory and renderer
 * @returns Express router; named-URL wizards also get `/:step` routes
 */
export function createWizardRouter(deps: WizardRouterDeps): Router {
  const router = express.Router({ mergeParams: true });
  const log = deps.logger.child({ component: 'WizardRouter', wizard: deps.config.prefix });
  const named = deps.config.urlName !== null;

  router.use(express.urlencoded({ extended: false }));

  const handle = (method: 'GET' | 'POST'): RequestHandler =>
    asyncHandler(async (req, res) => {
      const storage = await deps.openStorage(req, res);
      const request = toWizardRequest(req, req.params['step'] ?? null, deps.readFiles?.(req));
      const controllerOptions = {
        config: deps.config,
        storage,
        renderer: deps.renderer,
        redirector: redirectResponses,
        logger: deps.logger,
      };

      let response: HttpResponse;
      if (named) {
        const controller = new NamedUrlWizardController(controllerOptions);
        response =
          method === 'GET' ? await controller.handleGet(request) : await controller.handlePost(request);
      } else {
        const controller = new WizardController(controllerOptions);
        response =
          method === 'GET' ? await controller.handleGet(request) : await controller.handlePost(request);
      }

      await storage.commit();
      sendWizardResponse(res, response);
    });

  router.get('/', handle('GET'));
  router.post('/', handle('POST'));
  if (named) {
    router.get('/:step', handle('GET'));
    router.post('/:step', handle('POST'));
  }

  // ===========================================================================
  // Error Handling
  // ===========================================================================

  router.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (!isClientWizardError(err)) {
      next(err);
      return;
    }
    log.warn({ code: err.code, path: req.originalUrl }, err.message);
    res.status(getHttpStatus(err.code)).json({ error: err.message, code: err.code });
  });

  return router;
}
