/**
 * Shared Types for Cloud Prospector
 *
 * Closed enumerations with their constant tables, plus the Result type
 * used wherever a per-item failure must not abort the caller.
 */

import { z } from 'zod';

// ===========================================
// Sector
// ===========================================

export const SectorSchema = z.enum([
  'banking',
  'fintech',
  'retail',
  'ecommerce',
  'manufacturing',
  'mining',
  'technology',
  'healthcare',
  'other',
]);

export type Sector = z.infer<typeof SectorSchema>;

/** Sectors the sales motion actively targets ('other' is recognized but not targeted) */
export const TARGET_SECTORS: readonly Sector[] = [
  'banking',
  'fintech',
  'retail',
  'ecommerce',
  'manufacturing',
  'mining',
  'technology',
  'healthcare',
];

/** Fit score per target sector, derived from closed success cases */
export const SECTOR_FIT_SCORES: Readonly<Partial<Record<Sector, number>>> = {
  banking: 100,
  fintech: 95,
  retail: 90,
  mining: 90,
  technology: 85,
  healthcare: 85,
  manufacturing: 80,
  ecommerce: 80,
};

export function isTargetSector(sector: Sector): boolean {
  return TARGET_SECTORS.includes(sector);
}

// ===========================================
// Company Size
// ===========================================

export const CompanySizeSchema = z.enum(['micro', 'small', 'medium', 'large', 'enterprise']);

export type CompanySize = z.infer<typeof CompanySizeSchema>;

export const COMPANY_SIZE_SCORES: Readonly<Record<CompanySize, number>> = {
  micro: 10,
  small: 30,
  medium: 60,
  large: 90,
  enterprise: 100,
};

/** Upper employee bound (inclusive) for each bucket; enterprise is open-ended */
export const COMPANY_SIZE_MAX_EMPLOYEES: Readonly<Record<Exclude<CompanySize, 'enterprise'>, number>> = {
  micro: 9,
  small: 49,
  medium: 499,
  large: 4999,
};

/**
 * Bucket a head count into a company size
 */
export function companySizeFromEmployees(employeeCount: number): CompanySize {
  if (employeeCount <= COMPANY_SIZE_MAX_EMPLOYEES.micro) return 'micro';
  if (employeeCount <= COMPANY_SIZE_MAX_EMPLOYEES.small) return 'small';
  if (employeeCount <= COMPANY_SIZE_MAX_EMPLOYEES.medium) return 'medium';
  if (employeeCount <= COMPANY_SIZE_MAX_EMPLOYEES.large) return 'large';
  return 'enterprise';
}

// ===========================================
// Cloud Maturity
// ===========================================

export const CloudMaturitySchema = z.enum(['none', 'exploring', 'adopting', 'mature', 'native']);

export type CloudMaturity = z.infer<typeof CloudMaturitySchema>;

/** Stage score used as a floor by the digital maturity factor */
export const CLOUD_MATURITY_SCORES: Readonly<Record<CloudMaturity, number>> = {
  none: 0,
  exploring: 20,
  adopting: 40,
  mature: 60,
  native: 80,
};

// ===========================================
// Priority
// ===========================================

export const PrioritySchema = z.enum(['HOT', 'WARM', 'COOL', 'COLD']);

export type Priority = z.infer<typeof PrioritySchema>;

export const PRIORITY_THRESHOLDS = {
  HOT: 80,
  WARM: 60,
  COOL: 40,
} as const;

/**
 * Priority tier for a score. Never stored; always derived on read.
 */
export function calculatePriority(score: number): Priority {
  if (score >= PRIORITY_THRESHOLDS.HOT) return 'HOT';
  if (score >= PRIORITY_THRESHOLDS.WARM) return 'WARM';
  if (score >= PRIORITY_THRESHOLDS.COOL) return 'COOL';
  return 'COLD';
}

// ===========================================
// Result
// ===========================================

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ===========================================
// Identifiers
// ===========================================

/**
 * Generate a prefixed, time-ordered identifier (e.g. lead_lx2k9a_f3k1z8q0)
 */
export function generateId(prefix: string): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 10);
  return `${prefix}_${timestamp}_${random}`;
}
