/**
 * Sector Detection Module
 *
 * Keyword-driven sector inference for leads that arrive without one.
 * Waterfall over the lead's text fields:
 *
 * 1. Free-text industry
 * 2. Company name
 *
 * Within a field the first sector (in data file order) with a matching
 * keyword wins, so fintech is tried before banking and ecommerce before
 * retail. Keywords match whole words after case and accent folding.
 *
 * @module lead-scorer/sector-detector
 */

import { z } from 'zod';
import { SectorSchema, type Sector } from '@cloud-prospector/lib';
import sectorKeywordData from './data/sector-keywords.json';

// ===========================================
// Keyword Table
// ===========================================

const SectorKeywordTableSchema = z.object({
  sectors: z.array(
    z.object({
      sector: SectorSchema,
      keywords: z.array(z.string().min(1)),
    })
  ),
});

interface CompiledSectorKeywords {
  sector: Sector;
  matchers: Array<{ keyword: string; pattern: RegExp }>;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Lowercase and strip diacritics ("Saúde" -> "saude")
 */
export function foldText(value: string): string {
  return value.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toLowerCase();
}

function compileKeywordTable(input: unknown): CompiledSectorKeywords[] {
  return SectorKeywordTableSchema.parse(input).sectors.map(({ sector, keywords }) => ({
    sector,
    matchers: keywords.map((keyword) => {
      const folded = foldText(keyword);
      return {
        keyword: folded,
        pattern: new RegExp(`(^|[^a-z0-9])${escapeRegExp(folded)}($|[^a-z0-9])`),
      };
    }),
  }));
}

const SECTOR_KEYWORDS = compileKeywordTable(sectorKeywordData);

// ===========================================
// Detection
// ===========================================

export type SectorSource = 'industry' | 'company_name';

export interface SectorDetection {
  sector: Sector;
  source: SectorSource;
  matched_keyword: string;
}

/**
 * Match a single text against the keyword table
 */
export function matchSector(text: string): { sector: Sector; matched_keyword: string } | null {
  const folded = foldText(text).trim();
  if (!folded) return null;

  for (const entry of SECTOR_KEYWORDS) {
    for (const { keyword, pattern } of entry.matchers) {
      if (pattern.test(folded)) {
        return { sector: entry.sector, matched_keyword: keyword };
      }
    }
  }

  return null;
}

/**
 * Infer a sector from industry, then company name. Returns null when
 * nothing matches; the lead's sector then stays unset.
 */
export function detectSector(input: {
  industry?: string;
  company_name: string;
}): SectorDetection | null {
  const sources: Array<[SectorSource, string | undefined]> = [
    ['industry', input.industry],
    ['company_name', input.company_name],
  ];

  for (const [source, text] of sources) {
    if (!text) continue;
    const match = matchSector(text);
    if (match) {
      return { ...match, source };
    }
  }

  return null;
}
