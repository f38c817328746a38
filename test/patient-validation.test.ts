import { describe, expect, it } from 'vitest';
import {
  normalizeIdentityKey,
  normalizeInsuranceType,
  parseDateOfBirth,
  placeholderEmail,
} from '../src/validation/patient.js';

describe('normalizeIdentityKey', () => {
  it('accepts eleven digits', () => {
    expect(normalizeIdentityKey('12345678900')).toBe('12345678900');
  });

  it('strips dots, dashes and spaces', () => {
    expect(normalizeIdentityKey('123.456.789-00')).toBe('12345678900');
    expect(normalizeIdentityKey(' 123 456 789 00 ')).toBe('12345678900');
  });

  it('rejects the wrong length or non-digits', () => {
    expect(normalizeIdentityKey('123')).toBeNull();
    expect(normalizeIdentityKey('123456789001')).toBeNull();
    expect(normalizeIdentityKey('1234567890a')).toBeNull();
    expect(normalizeIdentityKey('')).toBeNull();
  });
});

describe('parseDateOfBirth', () => {
  const today = new Date(2026, 9, 18);

  it('keeps ISO dates', () => {
    expect(parseDateOfBirth('1990-03-15', today)).toBe('1990-03-15');
  });

  it('converts day-first dates', () => {
    expect(parseDateOfBirth('15/03/1990', today)).toBe('1990-03-15');
  });

  it('rejects impossible calendar dates', () => {
    expect(parseDateOfBirth('1990-02-30', today)).toBeNull();
    expect(parseDateOfBirth('31/04/1990', today)).toBeNull();
  });

  it('rejects future dates but accepts today', () => {
    expect(parseDateOfBirth('2026-10-19', today)).toBeNull();
    expect(parseDateOfBirth('2026-10-18', today)).toBe('2026-10-18');
  });

  it('rejects other formats', () => {
    expect(parseDateOfBirth('March 15 1990', today)).toBeNull();
    expect(parseDateOfBirth('1990/03/15', today)).toBeNull();
  });
});

describe('normalizeInsuranceType', () => {
  it('defaults to PRIVATE_PAY', () => {
    expect(normalizeInsuranceType(undefined)).toBe('PRIVATE_PAY');
    expect(normalizeInsuranceType(null)).toBe('PRIVATE_PAY');
    expect(normalizeInsuranceType('')).toBe('PRIVATE_PAY');
    expect(normalizeInsuranceType('premium')).toBe('PRIVATE_PAY');
  });

  it('normalizes case and the legacy alias', () => {
    expect(normalizeInsuranceType(' health_plan ')).toBe('HEALTH_PLAN');
    expect(normalizeInsuranceType('particular')).toBe('PRIVATE_PAY');
  });
});

describe('placeholderEmail', () => {
  it('derives the address from the identity key', () => {
    expect(placeholderEmail('12345678900')).toBe('patient_12345678900@placeholder.invalid');
  });
});
