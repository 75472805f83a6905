/**
 * Playlist Recommender Tests
 *
 * Template catalogue, size estimation, confidence and ranking.
 *
 * @module __tests__/playlists/recommender.test
 */

import { describe, it, expect } from 'vitest';
import { LeadSchema, type Lead, type RawLead, type UserPreferences } from '@cloud-prospector/lib';
import { PLAYLIST_TEMPLATES } from '../../playlists/templates';
import {
  calculateConfidence,
  defaultPreferences,
  estimatePlaylistSize,
  matchesUserPreferences,
  recommendTemplates,
} from '../../playlists/recommender';
import type { PlaylistTemplate } from '../../playlists/types';

function createTestLead(overrides: Partial<RawLead> = {}): Lead {
  return LeadSchema.parse({ company_name: 'Test Company', ...overrides });
}

function template(name: string): PlaylistTemplate {
  const found = PLAYLIST_TEMPLATES.find((t) => t.name === name);
  if (!found) throw new Error(`missing template ${name}`);
  return found;
}

describe('PLAYLIST_TEMPLATES', () => {
  it('loads the six catalogue templates', () => {
    expect(PLAYLIST_TEMPLATES.map((t) => t.name)).toEqual([
      'Hot AWS Migration Prospects',
      'Banking Digital Transformation',
      'Scale-up Tech Companies',
      'Industry 4.0 Manufacturers',
      'E-commerce Growth Opportunities',
      'New Decision Makers',
    ]);
  });
});

describe('estimatePlaylistSize', () => {
  it('applies score and sector selectivity without a pool', () => {
    expect(estimatePlaylistSize({})).toBe(100);
    expect(estimatePlaylistSize({ min_score: 85 })).toBe(30);
    expect(estimatePlaylistSize({ min_score: 80 })).toBe(50);
    expect(estimatePlaylistSize({ min_score: 60 })).toBe(100);
    expect(estimatePlaylistSize({ sectors: ['banking'] })).toBe(60);
    expect(estimatePlaylistSize({ min_score: 70, sectors: ['banking', 'fintech'] })).toBe(56);
    expect(estimatePlaylistSize({ min_score: 65, sectors: ['technology'] })).toBe(42);
    expect(estimatePlaylistSize({ sectors: ['banking', 'retail', 'mining'] })).toBe(100);
  });

  it('treats an empty pool as no pool', () => {
    expect(estimatePlaylistSize({ min_score: 85 }, [])).toBe(30);
  });

  it('counts pool matches and ignores the criteria limit', () => {
    const pool = [
      createTestLead({ sector: 'banking', score: 90 }),
      createTestLead({ sector: 'banking', score: 72 }),
      createTestLead({ sector: 'retail', score: 95 }),
    ];
    expect(estimatePlaylistSize({ sectors: ['banking'], min_score: 70, limit: 1 }, pool)).toBe(2);
  });
});

describe('matchesUserPreferences', () => {
  const preferences = defaultPreferences('user_1');

  it('requires a sector overlap', () => {
    expect(matchesUserPreferences(template('Banking Digital Transformation'), preferences)).toBe(true);
    expect(matchesUserPreferences(template('Industry 4.0 Manufacturers'), preferences)).toBe(false);
  });

  it('requires the template floor to reach the user floor', () => {
    expect(matchesUserPreferences(template('E-commerce Growth Opportunities'), preferences)).toBe(false);
  });

  it('skips the sector check when the user has no preferred sectors', () => {
    const open: UserPreferences = { ...preferences, preferred_sectors: [], min_score: 0 };
    expect(matchesUserPreferences(template('Industry 4.0 Manufacturers'), open)).toBe(true);
  });
});

describe('calculateConfidence', () => {
  const preferences = defaultPreferences('user_1');

  it('adds overlap, score alignment and keyword bonuses', () => {
    expect(calculateConfidence(template('Banking Digital Transformation'), preferences)).toBe(1);
    expect(calculateConfidence(template('Hot AWS Migration Prospects'), preferences)).toBe(0.85);
    expect(calculateConfidence(template('Scale-up Tech Companies'), preferences)).toBe(0.85);
  });

  it('treats a missing min_score as 50', () => {
    const bare: PlaylistTemplate = { name: 'Bare', description: 'plain', criteria: {}, reasoning: '' };
    expect(calculateConfidence(bare, { ...preferences, min_score: 45 })).toBe(0.65);
    expect(calculateConfidence(bare, { ...preferences, min_score: 61 })).toBe(0.5);
  });
});

describe('recommendTemplates', () => {
  it('ranks templates for the default preferences', () => {
    const result = recommendTemplates(defaultPreferences('user_1'));

    expect(result.map((r) => [r.name, r.confidence, r.estimated_leads])).toEqual([
      ['Banking Digital Transformation', 1, 56],
      ['Hot AWS Migration Prospects', 0.85, 50],
      ['Scale-up Tech Companies', 0.85, 42],
    ]);
    expect(result.every((r) => r.playlist_type === 'dynamic')).toBe(true);
  });

  it('breaks confidence ties by estimated size', () => {
    const open: UserPreferences = {
      ...defaultPreferences('user_2'),
      preferred_sectors: [],
      min_score: 0,
    };

    expect(recommendTemplates(open).map((r) => [r.name, r.confidence, r.estimated_leads])).toEqual([
      ['E-commerce Growth Opportunities', 0.65, 80],
      ['Banking Digital Transformation', 0.65, 56],
      ['Hot AWS Migration Prospects', 0.65, 50],
      ['New Decision Makers', 0.5, 100],
      ['Industry 4.0 Manufacturers', 0.5, 60],
    ]);
  });

  it('offers the sectorless template once the user floor is at most 50', () => {
    const preferences: UserPreferences = { ...defaultPreferences('user_3'), min_score: 50 };

    expect(recommendTemplates(preferences).map((r) => [r.name, r.confidence, r.estimated_leads])).toEqual([
      ['E-commerce Growth Opportunities', 1, 80],
      ['Banking Digital Transformation', 0.85, 56],
      ['Hot AWS Migration Prospects', 0.85, 50],
      ['Scale-up Tech Companies', 0.7, 42],
      ['New Decision Makers', 0.65, 100],
    ]);
    expect(matchesUserPreferences(template('New Decision Makers'), { ...preferences, min_score: 51 })).toBe(false);
  });

  it('respects the limit', () => {
    expect(recommendTemplates(defaultPreferences('user_1'), { limit: 1 })).toHaveLength(1);
  });
});
