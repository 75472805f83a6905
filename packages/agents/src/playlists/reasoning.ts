/**
 * Daily Recommendation Reasoning
 *
 * Short explanations and next steps attached to each recommended lead,
 * derived from its score band, sector and cloud posture.
 *
 * @module playlists/reasoning
 */

import type { Lead, Sector } from '@cloud-prospector/lib';

const SCORE_REASONS: ReadonlyArray<{ min: number; text: string }> = [
  { min: 80, text: 'Very high score: extremely qualified prospect' },
  { min: 70, text: 'High score: excellent opportunity' },
  { min: 60, text: 'Good score: worth approaching' },
];

const SECTOR_REASONS: Readonly<Partial<Record<Sector, string>>> = {
  banking: 'Banking sector: top priority',
  technology: 'Tech company: understands the value of cloud',
  retail: 'Retail: needs to scale for demand peaks',
};

const SECTOR_ACTIONS: Readonly<Partial<Record<Sector, string>>> = {
  banking: 'Emphasize compliance and security',
  retail: 'Highlight scalability for peaks',
};

const MAX_REASONS = 3;

function cloudReason(lead: Lead): string {
  if (lead.aws_usage) return 'Already on AWS: expansion opportunity';
  if (lead.competitor_cloud) return 'Uses a competing cloud: migration potential';
  return 'No cloud yet: first migration opportunity';
}

export function generateLeadReasoning(lead: Lead, playlistName: string): string {
  const reasons: string[] = [];

  const band = SCORE_REASONS.find((entry) => lead.score >= entry.min);
  if (band) reasons.push(band.text);

  const sectorReason = lead.sector ? SECTOR_REASONS[lead.sector] : undefined;
  if (sectorReason) reasons.push(sectorReason);

  reasons.push(cloudReason(lead));

  return `Selected from playlist '${playlistName}'. ${reasons.slice(0, MAX_REASONS).join('. ')}`;
}

export function generateSuggestedActions(lead: Lead, limit = 4): string[] {
  const actions = ['Research contacts on LinkedIn'];

  if (lead.website) {
    actions.push('Review the company website');
  }

  if (lead.score >= 80) {
    actions.push('Schedule a discovery meeting', 'Prepare a similar customer case');
  } else if (lead.score >= 70) {
    actions.push('Send a personalized email', 'Prepare an initial proposal');
  } else {
    actions.push('Nurture with content');
  }

  const sectorAction = lead.sector ? SECTOR_ACTIONS[lead.sector] : undefined;
  if (sectorAction) actions.push(sectorAction);

  return actions.slice(0, limit);
}
