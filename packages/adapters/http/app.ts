/**
 * Wizard App
 *
 * Assembles an express application serving one or more wizards from the
 * host environment: logger, session store and per-wizard storage backend.
 * The caller decides when to listen.
 */

import cookieParser from 'cookie-parser';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Logger } from 'pino';
import { ConfigurationError } from '@stepwise/core/domain';
import type { IWizardRenderer } from '@stepwise/core/ports';
import { loadWizardEnv, type WizardHostConfig } from '../config/env.js';
import { createLogger } from '../logging/logger.js';
import { createSessionStore, type RedisClient } from '../storage/session-storage.js';
import type { WizardConfig } from '../wizard/config.js';
import {
  cookieStorageFactory,
  createWizardRouter,
  sessionStorageFactory,
  type HttpResponse,
  type StorageFactory,
} from './express-router.js';

// =============================================================================
// Types
// =============================================================================

export interface MountedWizard {
  /** Mount path, e.g. `/checkout` */
  path: string;
  config: WizardConfig<HttpResponse>;
  renderer: IWizardRenderer<HttpResponse>;
  /** Where the wizard keeps its state (default: session) */
  storage?: 'session' | 'cookie';
}

export interface WizardAppOptions {
  wizards: MountedWizard[];
  /** Environment variables (default: process.env) */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Session store; defaults to Redis at REDIS_URL, else process memory */
  sessionStore?: RedisClient;
}

export interface WizardApp {
  app: Express;
  logger: Logger;
  hostConfig: WizardHostConfig;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the express app of a wizard host.
 *
 * @throws ConfigurationError for invalid environment settings, or a cookie
 *   wizard without a signing secret
 */
export function createWizardApp(options: WizardAppOptions): WizardApp {
  const hostConfig = loadWizardEnv(options.env);
  const logger =
    options.logger ??
    createLogger({ level: hostConfig.logLevel, pretty: hostConfig.nodeEnv === 'development' });
  const sessionStore =
    options.sessionStore ?? createSessionStore(hostConfig.redisUrl ?? undefined, logger);

  const app = express();
  app.use(cookieParser());

  for (const wizard of options.wizards) {
    const openStorage = storageFor(wizard, hostConfig, sessionStore, logger);
    app.use(
      wizard.path,
      createWizardRouter({
        config: wizard.config,
        openStorage,
        renderer: wizard.renderer,
        logger,
      })
    );
    logger.info({ path: wizard.path, wizard: wizard.config.prefix }, 'Wizard mounted');
  }

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err, path: req.originalUrl }, 'Unhandled wizard error');
    res.status(500).json({ error: 'Internal server error' });
  });

  return { app, logger, hostConfig };
}

function storageFor(
  wizard: MountedWizard,
  hostConfig: WizardHostConfig,
  sessionStore: RedisClient,
  logger: Logger
): StorageFactory {
  const { prefix, fileStorage } = wizard.config;

  if (wizard.storage === 'cookie') {
    if (!hostConfig.signingSecret) {
      throw new ConfigurationError('Cookie wizard storage needs a signing secret', [
        `Set WIZARD_SIGNING_SECRET to serve "${wizard.path}"`,
      ]);
    }
    return cookieStorageFactory({ prefix, secret: hostConfig.signingSecret, logger, fileStorage });
  }

  return sessionStorageFactory({
    prefix,
    redis: sessionStore,
    logger,
    ttlSeconds: hostConfig.sessionTtlSeconds,
    fileStorage,
  });
}
