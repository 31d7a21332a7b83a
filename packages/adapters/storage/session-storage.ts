/**
 * SessionWizardStorage
 *
 * Server-side wizard state. The record lives in a key-value store (Redis, or
 * the in-process MemorySessionStore) under `wizard:state:{sessionId}:{prefix}`
 * with a TTL refreshed on every commit.
 */

import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { createEmptyState } from '@stepwise/core/domain';
import {
  DEFAULT_STATE_TTL_SECONDS,
  MAX_STATE_TTL_SECONDS,
  STATE_KEY_PREFIXES,
} from '@stepwise/core/ports';
import { BaseWizardStorage, type WizardStorageOptions } from './base-storage.js';
import { parseWizardState } from './state-schema.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Key-value client interface.
 * Matches ioredis clients.
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

/**
 * Options for SessionWizardStorage.
 */
export interface SessionWizardStorageOptions extends WizardStorageOptions {
  /** Key-value client */
  redis: RedisClient;
  /** Identity of the client session */
  sessionId: string;
  /** State TTL in seconds (default: 900, capped at 3600) */
  ttlSeconds?: number;
}

// =============================================================================
// Implementation
// =============================================================================

export class SessionWizardStorage extends BaseWizardStorage {
  readonly sessionId: string;
  readonly ttlSeconds: number;
  private readonly redis: RedisClient;

  constructor(options: SessionWizardStorageOptions) {
    super(options, 'SessionWizardStorage');
    this.redis = options.redis;
    this.sessionId = options.sessionId;
    this.ttlSeconds = Math.min(options.ttlSeconds ?? DEFAULT_STATE_TTL_SECONDS, MAX_STATE_TTL_SECONDS);
  }

  get key(): string {
    return `${STATE_KEY_PREFIXES.STATE}${this.sessionId}:${this.prefix}`;
  }

  /**
   * Load the record from the store. Missing or unreadable records start empty.
   */
  async load(): Promise<void> {
    const serialized = await this.redis.get(this.key);
    if (serialized === null) {
      this.state = createEmptyState();
      return;
    }

    const state = parseWizardState(serialized);
    if (!state) {
      this.log.warn({ key: this.key }, 'Discarding unreadable wizard state');
      this.state = createEmptyState();
      return;
    }
    this.state = state;
  }

  async commit(): Promise<void> {
    await this.redis.setex(this.key, this.ttlSeconds, this.serialize());
    this.log.debug({ key: this.key, step: this.state.step }, 'Wizard state committed');
  }
}

/**
 * Create and load a session storage.
 */
export async function openSessionStorage(
  options: SessionWizardStorageOptions
): Promise<SessionWizardStorage> {
  const storage = new SessionWizardStorage(options);
  await storage.load();
  return storage;
}

// =============================================================================
// Stores
// =============================================================================

/**
 * In-process key-value store with expiry.
 * For single-process deployments and tests.
 */
export class MemorySessionStore implements RedisClient {
  private readonly entries = new Map<string, { value: string; expiresAt: number }>();

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (Date.now() > entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async setex(key: string, seconds: number, value: string): Promise<unknown> {
    this.entries.set(key, { value, expiresAt: Date.now() + seconds * 1000 });
    return 'OK';
  }

  async del(key: string): Promise<number> {
    return this.entries.delete(key) ? 1 : 0;
  }
}

/**
 * Create the key-value store for session state: Redis when a URL is given,
 * otherwise an in-process store.
 *
 * @param redisUrl - Redis connection URL
 * @param logger - Logger instance
 */
export function createSessionStore(redisUrl: string | undefined, logger: Logger): RedisClient {
  if (!redisUrl) {
    logger.warn('REDIS_URL not set, wizard state is kept in process memory');
    return new MemorySessionStore();
  }
  logger.info('Wizard state is kept in Redis');
  return new Redis(redisUrl, { lazyConnect: true });
}
