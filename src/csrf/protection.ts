/**
 * CSRF protection
 *
 * Mints one token per session, hands it to forms and checks it on submit:
 *
 *   const csrf = new CsrfProtection({ store: new MemoryTokenStore() });
 *   const form = createFormBuilder({ ...(await csrf.formConfig(sessionId)), action: '/profile' });
 *   ...
 *   if (!(await csrf.verify(sessionId, body._csrf))) reject();
 */

import { getLogger, loadCsrfSettings } from '../settings.js';
import { ConfigurationError } from '../shared/error-handler.js';
import type { Logger } from '../shared/logger.js';
import { fingerprint, generateToken, timingSafeEqual } from '../shared/security.js';
import type { TokenStore } from './store.js';

export interface CsrfOptions {
  store: TokenStore;
  /** Form field carrying the token */
  field?: string;
  /** Random bytes per token */
  tokenBytes?: number;
  logger?: Logger;
}

export interface CsrfFormConfig {
  csrfToken: string;
  csrfField: string;
}

export class CsrfProtection {
  readonly field: string;
  private readonly store: TokenStore;
  private readonly tokenBytes: number;
  private readonly logger: Logger;

  constructor(options: CsrfOptions) {
    const settings = loadCsrfSettings();
    this.store = options.store;
    this.field = options.field || settings.csrfField;
    this.tokenBytes = options.tokenBytes ?? settings.csrfTokenBytes;
    this.logger = options.logger ?? getLogger().child({ scope: 'csrf' });

    if (!Number.isInteger(this.tokenBytes) || this.tokenBytes < 16) {
      throw new ConfigurationError(`CSRF tokens need at least 16 random bytes, got ${this.tokenBytes}`, {
        tokenBytes: this.tokenBytes,
      });
    }
  }

  /**
   * The session's token, minting one on first use.
   */
  async token(sessionId: string): Promise<string> {
    const existing = await this.store.get(sessionId);
    if (existing) {
      return existing;
    }
    return this.rotate(sessionId);
  }

  /**
   * Replace the session's token, e.g. after login.
   */
  async rotate(sessionId: string): Promise<string> {
    const token = generateToken(this.tokenBytes);
    await this.store.set(sessionId, token);
    this.logger.debug('Issued CSRF token', { session: fingerprint(sessionId) });
    return token;
  }

  async verify(sessionId: string, submitted: unknown): Promise<boolean> {
    if (typeof submitted !== 'string' || submitted === '') {
      this.logger.warn('CSRF token missing from submission', { session: fingerprint(sessionId) });
      return false;
    }

    const expected = await this.store.get(sessionId);
    if (!expected) {
      this.logger.warn('No CSRF token stored for session', { session: fingerprint(sessionId) });
      return false;
    }

    const valid = timingSafeEqual(expected, submitted);
    if (!valid) {
      this.logger.warn('CSRF token mismatch', { session: fingerprint(sessionId) });
    }
    return valid;
  }

  async revoke(sessionId: string): Promise<void> {
    await this.store.delete(sessionId);
  }

  /**
   * Token and field name, ready to spread into a FormConfig.
   */
  async formConfig(sessionId: string): Promise<CsrfFormConfig> {
    return { csrfToken: await this.token(sessionId), csrfField: this.field };
  }
}
