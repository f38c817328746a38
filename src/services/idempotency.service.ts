import { createHash } from 'crypto';
import type { Db } from '../db/sqlite.js';
import { logger } from '../lib/logger.js';
import type { ApiResponse, IdempotencyRecord } from '../types/index.js';

export interface StoredResponse {
  status: number;
  body: ApiResponse;
}

export type IdempotencyCheck =
  | { found: false }
  | { found: true; mismatch: true }
  | { found: true; mismatch: false; response: StoredResponse };

export const DEFAULT_TTL_HOURS = 24;

export interface IdempotencyOptions {
  /** How long a stored response is replayed before the key may be reused. */
  ttlHours?: number;
  now?: () => Date;
}

function prepareStatements(db: Db) {
  return {
    getKey: db.prepare<[string, string], IdempotencyRecord>(`
      SELECT * FROM idempotency_keys WHERE idempotency_key = ? AND created_at >= ?
    `),
    insertKey: db.prepare<[string, string, number, string, string]>(`
      INSERT OR IGNORE INTO idempotency_keys
        (idempotency_key, request_hash, response_status, response_body, created_at)
      VALUES (?, ?, ?, ?, ?)
    `),
    deleteExpired: db.prepare<[string]>(`
      DELETE FROM idempotency_keys WHERE created_at < ?
    `),
  };
}

/**
 * Remembers the response given to each idempotency key so a retried
 * request gets the first answer instead of a second booking.
 */
export class IdempotencyService {
  private readonly statements: ReturnType<typeof prepareStatements>;
  private readonly ttlMs: number;
  private readonly now: () => Date;

  constructor(db: Db, options: IdempotencyOptions = {}) {
    this.statements = prepareStatements(db);
    this.ttlMs = (options.ttlHours ?? DEFAULT_TTL_HOURS) * 60 * 60 * 1000;
    this.now = options.now ?? (() => new Date());
  }

  private cutoff(): string {
    return new Date(this.now().getTime() - this.ttlMs).toISOString();
  }

  /**
   * Hash of the request body. Key order does not matter.
   */
  hashRequest(payload: unknown): string {
    return createHash('sha256').update(stableStringify(payload)).digest('hex');
  }

  check(idempotencyKey: string, payload: unknown): IdempotencyCheck {
    const row = this.statements.getKey.get(idempotencyKey, this.cutoff());
    if (!row) {
      return { found: false };
    }

    if (row.request_hash !== this.hashRequest(payload)) {
      return { found: true, mismatch: true };
    }

    const body: ApiResponse = JSON.parse(row.response_body);
    return {
      found: true,
      mismatch: false,
      response: { status: row.response_status, body },
    };
  }

  /** Expired keys are deleted first, so an expired key can be stored again. */
  store(idempotencyKey: string, payload: unknown, response: StoredResponse): void {
    try {
      const pruned = this.statements.deleteExpired.run(this.cutoff()).changes;
      if (pruned > 0) {
        logger.debug('Expired idempotency keys pruned', { pruned });
      }
      this.statements.insertKey.run(
        idempotencyKey,
        this.hashRequest(payload),
        response.status,
        JSON.stringify(response.body),
        this.now().toISOString()
      );
    } catch (error) {
      // A failed write only costs replay protection for this key.
      logger.error('Failed to store idempotency key', { idempotencyKey, error });
    }
  }
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, entry]) => `${JSON.stringify(key)}:${stableStringify(entry)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}
