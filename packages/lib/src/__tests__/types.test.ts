/**
 * Enumeration Table Tests
 *
 * Tests for priority tiers, company size buckets and sector tables.
 *
 * @module __tests__/types
 */

import { describe, test, expect } from 'vitest';
import {
  calculatePriority,
  companySizeFromEmployees,
  isTargetSector,
  SECTOR_FIT_SCORES,
  generateId,
  ok,
  err,
} from '../types';

// ===========================================
// calculatePriority
// ===========================================

describe('calculatePriority', () => {
  test('assigns HOT at 80 and above', () => {
    expect(calculatePriority(80)).toBe('HOT');
    expect(calculatePriority(100)).toBe('HOT');
  });

  test('assigns WARM between 60 and 80', () => {
    expect(calculatePriority(60)).toBe('WARM');
    expect(calculatePriority(79.99)).toBe('WARM');
  });

  test('assigns COOL between 40 and 60', () => {
    expect(calculatePriority(40)).toBe('COOL');
    expect(calculatePriority(59.99)).toBe('COOL');
  });

  test('assigns COLD below 40', () => {
    expect(calculatePriority(39.99)).toBe('COLD');
    expect(calculatePriority(0)).toBe('COLD');
  });
});

// ===========================================
// companySizeFromEmployees
// ===========================================

describe('companySizeFromEmployees', () => {
  test('buckets at inclusive upper bounds', () => {
    expect(companySizeFromEmployees(9)).toBe('micro');
    expect(companySizeFromEmployees(10)).toBe('small');
    expect(companySizeFromEmployees(49)).toBe('small');
    expect(companySizeFromEmployees(499)).toBe('medium');
    expect(companySizeFromEmployees(4999)).toBe('large');
    expect(companySizeFromEmployees(5000)).toBe('enterprise');
  });
});

// ===========================================
// Sector tables
// ===========================================

describe('sector tables', () => {
  test('other is recognized but not targeted', () => {
    expect(isTargetSector('other')).toBe(false);
    expect(SECTOR_FIT_SCORES.other).toBeUndefined();
  });

  test('every target sector has a fit score', () => {
    expect(isTargetSector('banking')).toBe(true);
    expect(SECTOR_FIT_SCORES.banking).toBe(100);
    expect(SECTOR_FIT_SCORES.fintech).toBe(95);
    expect(SECTOR_FIT_SCORES.ecommerce).toBe(80);
  });
});

// ===========================================
// Helpers
// ===========================================

describe('generateId', () => {
  test('prefixes identifiers', () => {
    expect(generateId('lead')).toMatch(/^lead_[a-z0-9]+_[a-z0-9]+$/);
  });

  test('produces distinct values', () => {
    expect(generateId('pl')).not.toBe(generateId('pl'));
  });
});

describe('Result helpers', () => {
  test('ok and err build discriminated results', () => {
    expect(ok(5)).toEqual({ ok: true, value: 5 });
    expect(err('boom')).toEqual({ ok: false, error: 'boom' });
  });
});
