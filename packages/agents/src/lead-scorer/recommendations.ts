/**
 * Sales Recommendations
 *
 * Ordered talking points for a scored lead, keyed on size, maturity,
 * competitor and sector.
 *
 * @module lead-scorer/recommendations
 */

import type { Lead, Sector } from '@cloud-prospector/lib';

export const MAX_RECOMMENDATIONS = 5;

const SECTOR_RECOMMENDATIONS: Readonly<Partial<Record<Sector, readonly string[]>>> = {
  banking: ['Compliance and security assessment', 'High-availability architecture'],
  retail: ['Scalable e-commerce infrastructure', 'CDN and performance optimization'],
  healthcare: ['HIPAA compliance setup', 'Secure data storage solutions'],
  manufacturing: ['IoT and data analytics platform', 'Supply chain optimization'],
};

/**
 * Build recommendations in size, maturity, competitor, sector order,
 * keeping the first `limit`.
 */
export function getRecommendations(lead: Lead, limit: number = MAX_RECOMMENDATIONS): string[] {
  const recommendations: string[] = [];

  if (lead.company_size === 'large' || lead.company_size === 'enterprise') {
    recommendations.push('Enterprise-grade AWS solutions with dedicated support');
    recommendations.push('Cost optimization assessment for large-scale infrastructure');
  }

  switch (lead.cloud_maturity) {
    case 'none':
      recommendations.push('Cloud readiness assessment and migration planning');
      break;
    case 'exploring':
      recommendations.push('Proof of concept for key workloads');
      break;
    case 'adopting':
    case 'mature':
      recommendations.push('AWS Well-Architected Review');
      recommendations.push('Advanced services adoption (AI/ML, Analytics)');
      break;
    default:
      break;
  }

  if (lead.competitor_cloud) {
    recommendations.push(`Migration assessment from ${lead.competitor_cloud} to AWS`);
    recommendations.push('TCO comparison and migration roadmap');
  }

  if (lead.sector) {
    recommendations.push(...(SECTOR_RECOMMENDATIONS[lead.sector] ?? []));
  }

  return recommendations.slice(0, limit);
}
