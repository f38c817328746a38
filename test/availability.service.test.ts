import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { closeDatabase, type Db } from '../src/db/sqlite.js';
import { AvailabilityService } from '../src/services/availability.service.js';
import { SlotLedger } from '../src/services/slot-ledger.js';
import { ErrorCode } from '../src/types/index.js';
import { createTestDatabase, fixedClock } from './helpers.js';

describe('AvailabilityService', () => {
  let db: Db;
  let service: AvailabilityService;

  beforeEach(() => {
    db = createTestDatabase();
    service = new AvailabilityService(db, 20, fixedClock);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it('matches specialties by case-insensitive substring, earliest first', async () => {
    const result = await service.search('  CARDIO ');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.map((entry) => entry.slot.id)).toEqual([105, 101, 102, 103]);
    }
  });

  it('returns clinic, doctor, slot and price for each entry', async () => {
    const result = await service.search('derma');

    expect(result).toEqual({
      success: true,
      data: [
        {
          clinic: {
            id: 'C2',
            name: 'Clinica Horizonte',
            address: 'Avenida Central, 455',
            city: 'Campinas',
            state: 'SP',
            phone: '+55 19 3200-2000',
          },
          doctor: { id: 8, name: 'Dr. Paulo Mendes', specialty: 'Dermatology' },
          slot: { id: 104, date: '2030-05-06', time: '14:00' },
          price: 280,
        },
      ],
    });
  });

  it('leaves out held slots', async () => {
    new SlotLedger(db).claim(105);

    const result = await service.search('cardiology');

    expect(result.success && result.data.map((entry) => entry.slot.id)).toEqual([101, 102, 103]);
  });

  it('caps the result at the page size', async () => {
    const paged = new AvailabilityService(db, 2, fixedClock);

    const result = await paged.search('cardio');

    expect(result.success && result.data.map((entry) => entry.slot.id)).toEqual([105, 101]);
  });

  it('treats LIKE wildcards in the text literally', async () => {
    const result = await service.search('%');

    expect(result).toEqual({ success: true, data: [] });
  });

  it('returns an empty list for an unknown specialty', async () => {
    const result = await service.search('neurology');

    expect(result).toEqual({ success: true, data: [] });
  });

  it('rejects a blank specialty', async () => {
    const result = await service.search('   ');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(ErrorCode.VALIDATION_ERROR);
    }
  });

  it('folds accented capitals in stored specialties', async () => {
    db.prepare(
      "INSERT INTO doctors (id, clinic_id, name, specialty, consultation_price) VALUES (10, 'C1', 'Dr. Rui Costa', 'CLÍNICA GERAL', 200)"
    ).run();
    db.prepare(
      "INSERT INTO available_slots (id, doctor_id, clinic_id, date, time, is_available) VALUES (200, 10, 'C1', '2030-05-09', '11:00', 1)"
    ).run();

    for (const text of ['CLÍNICA GERAL', 'clínica', 'Clínica Geral']) {
      const result = await service.search(text);
      expect(result.success && result.data.map((entry) => entry.slot.id)).toEqual([200]);
    }
  });
});
