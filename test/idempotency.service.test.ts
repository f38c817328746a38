import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { closeDatabase, openDatabase, type Db } from '../src/db/sqlite.js';
import { IdempotencyService } from '../src/services/idempotency.service.js';
import { count } from './helpers.js';

describe('IdempotencyService', () => {
  let db: Db;
  let service: IdempotencyService;

  beforeEach(() => {
    db = openDatabase({ path: ':memory:', busyTimeoutMs: 50 });
    service = new IdempotencyService(db);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it('hashes payloads independently of key order', () => {
    expect(service.hashRequest({ a: 1, b: { c: 2, d: [1, 2] } })).toBe(
      service.hashRequest({ b: { d: [1, 2], c: 2 }, a: 1 })
    );
    expect(service.hashRequest({ a: 1 })).not.toBe(service.hashRequest({ a: 2 }));
  });

  it('returns the stored response for the same payload', () => {
    const response = { status: 201, body: { success: true, data: { appointmentId: 3 } } };
    service.store('key-1', { slotId: 101 }, response);

    expect(service.check('key-1', { slotId: 101 })).toEqual({
      found: true,
      mismatch: false,
      response,
    });
  });

  it('flags a different payload under the same key', () => {
    service.store('key-1', { slotId: 101 }, { status: 201, body: { success: true } });

    expect(service.check('key-1', { slotId: 102 })).toEqual({ found: true, mismatch: true });
  });

  it('keeps the first response when a key is stored twice', () => {
    service.store('key-1', { slotId: 101 }, { status: 201, body: { success: true } });
    service.store('key-1', { slotId: 101 }, { status: 409, body: { success: false } });

    const check = service.check('key-1', { slotId: 101 });
    expect(check.found && !check.mismatch && check.response.status).toBe(201);
  });

  it('reports unknown keys as not found', () => {
    expect(service.check('missing', {})).toEqual({ found: false });
  });

  describe('expiry', () => {
    let current: Date;

    beforeEach(() => {
      current = new Date('2026-10-18T10:00:00.000Z');
      service = new IdempotencyService(db, { ttlHours: 24, now: () => current });
    });

    it('replays a response inside the window', () => {
      service.store('key-1', { slotId: 101 }, { status: 201, body: { success: true } });
      current = new Date('2026-10-19T09:59:00.000Z');

      const check = service.check('key-1', { slotId: 101 });
      expect(check.found && !check.mismatch && check.response.status).toBe(201);
    });

    it('forgets an expired key and lets it be stored again', () => {
      service.store('key-1', { slotId: 101 }, { status: 201, body: { success: true } });
      current = new Date('2026-10-19T11:00:00.000Z');

      expect(service.check('key-1', { slotId: 102 })).toEqual({ found: false });

      service.store('key-1', { slotId: 102 }, { status: 409, body: { success: false } });
      const check = service.check('key-1', { slotId: 102 });
      expect(check.found && !check.mismatch && check.response.status).toBe(409);
      expect(count(db, 'SELECT COUNT(*) AS total FROM idempotency_keys')).toBe(1);
    });

    it('prunes expired keys when storing', () => {
      service.store('old-1', { slotId: 101 }, { status: 201, body: { success: true } });
      service.store('old-2', { slotId: 102 }, { status: 201, body: { success: true } });
      current = new Date('2026-10-20T10:00:00.000Z');

      service.store('new-1', { slotId: 103 }, { status: 201, body: { success: true } });

      const keys = db
        .prepare<[], { idempotency_key: string }>('SELECT idempotency_key FROM idempotency_keys')
        .all()
        .map((row) => row.idempotency_key);
      expect(keys).toEqual(['new-1']);
    });
  });
});
