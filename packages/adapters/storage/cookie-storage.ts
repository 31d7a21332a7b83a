/**
 * CookieWizardStorage
 *
 * Client-held wizard state. The record is serialized into a signed cookie
 * value, `<base64url(json)>.<hmac>`; a value whose signature does not verify
 * is rejected as tampered.
 */

import { createEmptyState, TamperedStateError } from '@stepwise/core/domain';
import { BaseWizardStorage, type WizardStorageOptions } from './base-storage.js';
import { sign, unsign } from './signing.js';
import { parseWizardState } from './state-schema.js';

/**
 * Options for CookieWizardStorage.
 */
export interface CookieWizardStorageOptions extends WizardStorageOptions {
  /** Signing secret */
  secret: string;
  /** Receives the signed cookie on commit */
  writeCookie?: (name: string, value: string) => void;
}

export class CookieWizardStorage extends BaseWizardStorage {
  private readonly secret: string;
  private readonly writeCookie: ((name: string, value: string) => void) | null;

  constructor(options: CookieWizardStorageOptions) {
    super(options, 'CookieWizardStorage');
    this.secret = options.secret;
    this.writeCookie = options.writeCookie ?? null;
  }

  get cookieName(): string {
    return `wizard_${this.prefix}`;
  }

  /**
   * Load the record from a cookie value. A missing cookie starts empty.
   *
   * @throws TamperedStateError if the signature or payload is invalid
   */
  load(cookieValue: string | null | undefined): void {
    if (!cookieValue) {
      this.state = createEmptyState();
      return;
    }

    const encoded = unsign(cookieValue, this.secret);
    if (encoded === null) {
      this.log.warn({ cookie: this.cookieName }, 'Wizard cookie signature mismatch');
      throw new TamperedStateError('WizardView cookie manipulated');
    }

    const state = parseWizardState(Buffer.from(encoded, 'base64url').toString('utf8'));
    if (!state) {
      throw new TamperedStateError('WizardView cookie manipulated');
    }
    this.state = state;
  }

  /**
   * Signed cookie value for the current record.
   */
  toCookie(): string {
    return sign(Buffer.from(this.serialize(), 'utf8').toString('base64url'), this.secret);
  }

  async commit(): Promise<void> {
    this.writeCookie?.(this.cookieName, this.toCookie());
  }
}
