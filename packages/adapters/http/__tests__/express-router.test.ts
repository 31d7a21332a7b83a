/**
 * Wizard Router Tests
 *
 * Requests are dispatched straight into the router with in-process request
 * and response stand-ins; nothing listens on a port.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Request, Response, Router } from 'express';
import type { Logger } from 'pino';
import { z } from 'zod';
import { TamperedStateError, WizardErrorCode } from '@stepwise/core/domain';
import type { IWizardRenderer } from '@stepwise/core/ports';
import { defineForm } from '../../forms/zod-form.js';
import { MemorySessionStore, SessionWizardStorage } from '../../storage/session-storage.js';
import { configureWizard } from '../../wizard/config.js';
import {
  cookieStorageFactory,
  createWizardRouter,
  getHttpStatus,
  sessionStorageFactory,
  SESSION_COOKIE_NAME,
  toFormData,
  toWizardRequest,
  type HttpResponse,
} from '../express-router.js';

// =============================================================================
// Stand-ins
// =============================================================================

class FakeResponse {
  statusCode = 200;
  location: string | null = null;
  contentType: string | null = null;
  body: unknown = undefined;
  readonly cookies: Array<[string, string]> = [];

  constructor(private readonly onFinish: () => void = () => undefined) {}

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  type(value: string): this {
    this.contentType = value;
    return this;
  }

  send(body: unknown): this {
    this.body = body;
    this.onFinish();
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    this.onFinish();
    return this;
  }

  redirect(code: number, location: string): void {
    this.statusCode = code;
    this.location = location;
    this.onFinish();
  }

  cookie(name: string, value: string): this {
    this.cookies.push([name, value]);
    return this;
  }
}

const createRequest = (
  method: 'GET' | 'POST',
  url: string,
  body: Record<string, unknown> = {},
  cookies: Record<string, string> = {}
) => ({ method, url, originalUrl: url, headers: {}, body, cookies, params: {} });

function dispatch(
  router: Router,
  method: 'GET' | 'POST',
  url: string,
  body: Record<string, unknown> = {}
): Promise<FakeResponse> {
  return new Promise((resolve, reject) => {
    const res: FakeResponse = new FakeResponse(() => resolve(res));
    const req = createRequest(method, url, body);
    router(req as unknown as Request, res as unknown as Response, (err?: unknown) => {
      reject(err instanceof Error ? err : new Error(`No route for ${method} ${url}`));
    });
  });
}

const createMockLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
  child: vi.fn().mockReturnThis(),
});

const ContactForm = defineForm('ContactForm', { name: z.string().min(1) });
const AddressForm = defineForm('AddressForm', { city: z.string().min(1) });

const renderer: IWizardRenderer<HttpResponse> = {
  render: (context) => ({ kind: 'html', status: 200, body: `step:${context.wizard.steps.current}` }),
};

const done = (): HttpResponse => ({ kind: 'redirect', location: '/thanks' });

// =============================================================================
// Mapping
// =============================================================================

describe('toFormData', () => {
  it('should keep string and string-list values only', () => {
    expect(toFormData({ a: '1', b: ['2', '3'], c: { nested: true }, d: 4 })).toEqual({
      a: '1',
      b: ['2', '3'],
    });
  });

  it('should map a missing body to an empty payload', () => {
    expect(toFormData(undefined)).toEqual({});
  });
});

describe('toWizardRequest', () => {
  it('should carry the body, query and step of a POST', () => {
    const req = createRequest('POST', '/checkout/address?b=2&a=1', { 'address-city': 'Paris' });

    expect(toWizardRequest(req as unknown as Request, 'address')).toEqual({
      method: 'POST',
      data: { 'address-city': 'Paris' },
      files: {},
      query: [
        ['b', '2'],
        ['a', '1'],
      ],
      stepParam: 'address',
    });
  });

  it('should ignore the body of a GET', () => {
    const req = createRequest('GET', '/checkout', { stray: 'value' });

    expect(toWizardRequest(req as unknown as Request, null).data).toEqual({});
  });
});

describe('getHttpStatus', () => {
  it('should map client errors to 400 and the rest to 500', () => {
    expect(getHttpStatus(WizardErrorCode.MISSING_MANAGEMENT_FORM)).toBe(400);
    expect(getHttpStatus(WizardErrorCode.TAMPERED_STATE)).toBe(400);
    expect(getHttpStatus(WizardErrorCode.CONFIGURATION)).toBe(500);
    expect(getHttpStatus(WizardErrorCode.NO_ACTIVE_STEPS)).toBe(500);
  });
});

// =============================================================================
// Storage Factories
// =============================================================================

describe('storage factories', () => {
  it('should issue a session cookie on first visit', async () => {
    const logger = createMockLogger();
    const openStorage = sessionStorageFactory({
      prefix: 'checkout',
      redis: new MemorySessionStore(),
      logger: logger as unknown as Logger,
    });
    const res = new FakeResponse();

    const storage = await openStorage(
      createRequest('GET', '/') as unknown as Request,
      res as unknown as Response
    );

    expect(storage).toBeInstanceOf(SessionWizardStorage);
    expect(res.cookies.map(([name]) => name)).toEqual([SESSION_COOKIE_NAME]);
  });

  it('should reuse an existing session cookie', async () => {
    const logger = createMockLogger();
    const openStorage = sessionStorageFactory({
      prefix: 'checkout',
      redis: new MemorySessionStore(),
      logger: logger as unknown as Logger,
    });
    const res = new FakeResponse();
    const req = createRequest('GET', '/', {}, { [SESSION_COOKIE_NAME]: 'session-1' });

    const storage = await openStorage(req as unknown as Request, res as unknown as Response);

    expect(res.cookies).toEqual([]);
    expect(storage instanceof SessionWizardStorage && storage.sessionId).toBe('session-1');
  });

  it('should reject a tampered state cookie', async () => {
    const logger = createMockLogger();
    const openStorage = cookieStorageFactory({
      prefix: 'checkout',
      secret: 'test-secret-value',
      logger: logger as unknown as Logger,
    });
    const req = createRequest('GET', '/', {}, { wizard_checkout: 'e30.bogus' });

    await expect(
      openStorage(req as unknown as Request, new FakeResponse() as unknown as Response)
    ).rejects.toThrow(TamperedStateError);
  });
});

// =============================================================================
// Router
// =============================================================================

describe('createWizardRouter', () => {
  let store: MemorySessionStore;
  let logger: ReturnType<typeof createMockLogger>;

  const openStorage = async () => {
    const storage = new SessionWizardStorage({
      redis: store,
      logger: logger as unknown as Logger,
      prefix: 'checkout',
      sessionId: 'session-1',
    });
    await storage.load();
    return storage;
  };

  const createRouter = (urlName?: string) =>
    createWizardRouter({
      config: configureWizard<HttpResponse>({
        name: 'Checkout',
        formList: [
          ['contact', ContactForm],
          ['address', AddressForm],
        ],
        urlName,
        done,
      }),
      openStorage,
      renderer,
      logger: logger as unknown as Logger,
    });

  beforeEach(() => {
    store = new MemorySessionStore();
    logger = createMockLogger();
  });

  describe('in-place wizard', () => {
    it('should start on the first step', async () => {
      const res = await dispatch(createRouter(), 'GET', '/');

      expect(res.statusCode).toBe(200);
      expect(res.contentType).toBe('html');
      expect(res.body).toBe('step:contact');
    });

    it('should commit the state after a submission', async () => {
      const router = createRouter();
      await dispatch(router, 'GET', '/');

      const res = await dispatch(router, 'POST', '/', {
        'checkout-current_step': 'contact',
        'contact-name': 'Ada',
      });
      const storage = await openStorage();

      expect(res.body).toBe('step:address');
      expect(storage.getCurrentStep()).toBe('address');
      expect(storage.getStepData('contact')).toEqual({
        'checkout-current_step': 'contact',
        'contact-name': 'Ada',
      });
    });

    it('should answer a missing management marker with 400', async () => {
      const res = await dispatch(createRouter(), 'POST', '/', { 'contact-name': 'Ada' });

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({
        error: 'ManagementForm data is missing or has been tampered.',
        code: 'missing_management_form',
      });
    });

    it('should redirect once the wizard completes', async () => {
      const router = createRouter();
      await dispatch(router, 'GET', '/');
      await dispatch(router, 'POST', '/', {
        'checkout-current_step': 'contact',
        'contact-name': 'Ada',
      });

      const res = await dispatch(router, 'POST', '/', {
        'checkout-current_step': 'address',
        'address-city': 'Paris',
      });

      expect(res.statusCode).toBe(302);
      expect(res.location).toBe('/thanks');
      expect((await openStorage()).getCurrentStep()).toBeNull();
    });
  });

  describe('named-URL wizard', () => {
    it('should redirect the bare address to the current step', async () => {
      const res = await dispatch(createRouter('checkout'), 'GET', '/');

      expect(res.statusCode).toBe(302);
      expect(res.location).toBe('/checkout/contact');
    });

    it('should render a step address', async () => {
      const res = await dispatch(createRouter('checkout'), 'GET', '/address');

      expect(res.body).toBe('step:address');
    });

    it('should redirect to the next step address after a submission', async () => {
      const res = await dispatch(createRouter('checkout'), 'POST', '/contact', {
        'checkout-current_step': 'contact',
        'contact-name': 'Ada',
      });

      expect(res.location).toBe('/checkout/address');
    });
  });
});
