/**
 * CSRF Token Store Interface and Implementations
 *
 * The form builder only ever sees a token string; where tokens live between
 * requests (memory, cookie session, Redis) is up to the store.
 */

import { loadCsrfSettings } from '../settings.js';

// ============================================================================
// Token Store Interface
// ============================================================================

export interface TokenStore {
  /**
   * Token for a session, or null when none is stored
   */
  get(sessionId: string): Promise<string | null>;

  set(sessionId: string, token: string): Promise<void>;

  delete(sessionId: string): Promise<void>;
}

// ============================================================================
// In-Memory Token Store (Development, Tests)
// ============================================================================

export interface MemoryTokenStoreOptions {
  /** Token lifetime in seconds; 0 keeps tokens until deleted (default: FORMSMITH_CSRF_TTL_SECONDS) */
  ttlSeconds?: number;
  /** Clock in milliseconds, injectable for tests */
  now?: () => number;
}

interface StoredToken {
  token: string;
  expiresAt: number;
}

export class MemoryTokenStore implements TokenStore {
  private tokens: Map<string, StoredToken> = new Map();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: MemoryTokenStoreOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? loadCsrfSettings().csrfTtlSeconds) * 1000;
    this.now = options.now ?? Date.now;
  }

  async get(sessionId: string): Promise<string | null> {
    const stored = this.tokens.get(sessionId);
    if (!stored) return null;

    if (stored.expiresAt <= this.now()) {
      this.tokens.delete(sessionId);
      return null;
    }

    return stored.token;
  }

  async set(sessionId: string, token: string): Promise<void> {
    const expiresAt = this.ttlMs > 0 ? this.now() + this.ttlMs : Number.POSITIVE_INFINITY;
    this.tokens.set(sessionId, { token, expiresAt });
  }

  async delete(sessionId: string): Promise<void> {
    this.tokens.delete(sessionId);
  }

  /**
   * Drop expired tokens, returning how many were removed
   */
  async cleanup(): Promise<number> {
    const now = this.now();
    let cleaned = 0;

    for (const [id, stored] of this.tokens) {
      if (stored.expiresAt <= now) {
        this.tokens.delete(id);
        cleaned++;
      }
    }

    return cleaned;
  }

  get size(): number {
    return this.tokens.size;
  }
}
