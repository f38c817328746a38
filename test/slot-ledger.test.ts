import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { closeDatabase, type Db } from '../src/db/sqlite.js';
import { SlotLedger } from '../src/services/slot-ledger.js';
import { createTestDatabase, slotFlag } from './helpers.js';

describe('SlotLedger', () => {
  let db: Db;
  let ledger: SlotLedger;

  beforeEach(() => {
    db = createTestDatabase();
    ledger = new SlotLedger(db);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it('claims an available slot exactly once', () => {
    expect(ledger.claim(101)).toBe(true);
    expect(ledger.claim(101)).toBe(false);
    expect(slotFlag(db, 101)).toBe(0);
  });

  it('refuses a slot that is already held', () => {
    expect(ledger.claim(107)).toBe(false);
    expect(slotFlag(db, 107)).toBe(0);
  });

  it('refuses an unknown slot', () => {
    expect(ledger.claim(999)).toBe(false);
  });

  it('releases a held slot', () => {
    ledger.claim(101);
    ledger.release(101);

    expect(slotFlag(db, 101)).toBe(1);
    expect(ledger.claim(101)).toBe(true);
  });

  it('treats releasing an available slot as a no-op', () => {
    ledger.release(102);
    ledger.release(999);

    expect(slotFlag(db, 102)).toBe(1);
  });

  it('reports availability through findById', () => {
    ledger.claim(102);

    expect(ledger.findById(101)).toEqual({
      id: 101,
      doctorId: 7,
      clinicId: 'C1',
      date: '2030-05-06',
      time: '09:00',
      availability: 'AVAILABLE',
    });
    expect(ledger.findById(102)?.availability).toBe('HELD');
    expect(ledger.findById(999)).toBeUndefined();
  });
});
