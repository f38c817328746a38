import type { InsuranceType } from '../types/index.js';

export const IDENTITY_KEY_LENGTH = 11;

const IDENTITY_KEY_PATTERN = new RegExp(`^\\d{${IDENTITY_KEY_LENGTH}}$`);
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_FIRST_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;

/**
 * Strip the usual punctuation from a national id ("123.456.789-00") and
 * return the bare digits, or null when the result is not a valid key.
 */
export function normalizeIdentityKey(raw: string): string | null {
  const digits = raw.replace(/[.\-\s]/g, '');
  return IDENTITY_KEY_PATTERN.test(digits) ? digits : null;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function buildIsoDate(year: number, month: number, day: number): string | null {
  const candidate = new Date(year, month - 1, day);
  if (
    candidate.getFullYear() !== year ||
    candidate.getMonth() !== month - 1 ||
    candidate.getDate() !== day
  ) {
    return null;
  }
  return toIsoDate(candidate);
}

/**
 * Accepts YYYY-MM-DD or DD/MM/YYYY and returns YYYY-MM-DD.
 * Impossible dates (2023-02-30) and dates after `today` are rejected.
 */
export function parseDateOfBirth(raw: string, today: Date = new Date()): string | null {
  const value = raw.trim();

  let iso: string | null = null;
  const isoMatch = ISO_DATE.exec(value);
  if (isoMatch) {
    iso = buildIsoDate(Number(isoMatch[1]), Number(isoMatch[2]), Number(isoMatch[3]));
  } else {
    const dayFirst = DAY_FIRST_DATE.exec(value);
    if (dayFirst) {
      iso = buildIsoDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
    }
  }

  if (!iso || iso > toIsoDate(today)) {
    return null;
  }
  return iso;
}

// PARTICULAR is the legacy spelling still sent by older callers.
const INSURANCE_ALIASES: Record<string, InsuranceType> = {
  PRIVATE_PAY: 'PRIVATE_PAY',
  PARTICULAR: 'PRIVATE_PAY',
  HEALTH_PLAN: 'HEALTH_PLAN',
};

export function normalizeInsuranceType(raw: string | null | undefined): InsuranceType {
  if (!raw) {
    return 'PRIVATE_PAY';
  }
  return INSURANCE_ALIASES[raw.trim().toUpperCase()] ?? 'PRIVATE_PAY';
}

export function placeholderEmail(identityKey: string): string {
  return `patient_${identityKey}@placeholder.invalid`;
}
