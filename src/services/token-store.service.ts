import crypto from 'crypto';
import { TokenExpiredError, TokenNotFoundError } from '../errors/relay.errors';
import type { EncryptedCredential, TokenRecord } from '../common/types/relay.types';
import { logger } from '../utils/logger';

const TOKEN_BYTES = 32;
const HOUR_MS = 60 * 60 * 1000;

export interface TokenStore {
  issue(encryptedCredential: EncryptedCredential): TokenRecord;
  lookup(token: string): EncryptedCredential;
  revoke(token: string): boolean;
  sweep(): number;
  size(): number;
  start(): void;
  stop(): void;
}

export interface TokenStoreOptions {
  ttlHours?: number;
  sweepIntervalMs?: number;
  now?: () => number;
}

/**
 * Process-local token map. Node runs request handlers on one thread, so plain
 * Map access needs no locking.
 */
export class InMemoryTokenStore implements TokenStore {
  private readonly records = new Map<string, TokenRecord>();
  private readonly ttlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: TokenStoreOptions = {}) {
    this.ttlMs = (options.ttlHours ?? 1) * HOUR_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  issue(encryptedCredential: EncryptedCredential): TokenRecord {
    let token = crypto.randomBytes(TOKEN_BYTES).toString('base64url');
    while (this.records.has(token)) {
      token = crypto.randomBytes(TOKEN_BYTES).toString('base64url');
    }
    const issuedAt = this.now();
    const record: TokenRecord = {
      token,
      encryptedCredential,
      issuedAt,
      expiresAt: issuedAt + this.ttlMs,
    };
    this.records.set(token, record);
    return record;
  }

  lookup(token: string): EncryptedCredential {
    const record = this.records.get(token);
    if (!record) throw new TokenNotFoundError();
    if (this.now() > record.expiresAt) {
      this.records.delete(token);
      throw new TokenExpiredError();
    }
    return record.encryptedCredential;
  }

  /** Returns false for unknown tokens and for expired ones, which are purged instead. */
  revoke(token: string): boolean {
    const record = this.records.get(token);
    if (!record) return false;
    this.records.delete(token);
    return this.now() <= record.expiresAt;
  }

  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, record] of this.records) {
      if (now > record.expiresAt) {
        this.records.delete(token);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.records.size;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) logger.info('Expired tokens swept', { removed, live: this.records.size });
    }, this.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.records.clear();
  }
}
