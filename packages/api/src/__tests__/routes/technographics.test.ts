/**
 * Technographics route tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { TechSignalBagSchema } from '@cloud-prospector/agents/technographics';
import { SMALL_LEAD, createTestApp, jsonRequest, type TestContext } from '../helpers';

const AZURE_SIGNALS = {
  technologies: ['azure', 'mysql'],
  categories: { cloud_provider: ['azure'], database: ['mysql'] },
};

describe('technographics routes', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestApp();
  });

  it('classifies a signal bag', async () => {
    const res = await ctx.app.request(
      '/api/technographics/classify',
      jsonRequest('POST', { company_name: 'Norte Ltda', signals: AZURE_SIGNALS })
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      signals: { tech_count: 2, aws_services: [] },
      profile: {
        cloud_maturity: 'adopting',
        migration_opportunities: [
          'Migration from competitor cloud to AWS',
          'Database migration to Amazon RDS for better management',
        ],
        intent: { score: 30, urgency: 'medium' },
        aws_usage: false,
        competitor_cloud: 'azure',
      },
    });
  });

  it('applies the profile to a stored lead and rescores it', async () => {
    await ctx.app.request('/api/leads/score', jsonRequest('POST', SMALL_LEAD));

    const res = await ctx.app.request(
      '/api/technographics/classify',
      jsonRequest('POST', { lead_id: 'lead_small', signals: AZURE_SIGNALS })
    );

    // small 9 + maturity floor 40 -> 10 + azure 20 + other 8
    expect(await res.json()).toMatchObject({
      lead: {
        lead_id: 'lead_small',
        technologies_used: ['azure', 'mysql'],
        cloud_maturity: 'adopting',
        competitor_cloud: 'azure',
        score: 47,
        score_details: { company_size: 30, digital_maturity: 40, cloud_usage: 80, sector_fit: 40 },
      },
    });

    const stored = await ctx.deps.leads.get('lead_small');
    expect(stored?.score).toBe(47);
  });

  it('inspects the website when only a url is given', async () => {
    ctx.pages.set('https://shop.example', '<html><script src="https://cdn.shopify.com/s/app.js"></script></html>');

    const res = await ctx.app.request(
      '/api/technographics/classify',
      jsonRequest('POST', { url: 'shop.example' })
    );

    expect(res.status).toBe(200);
    const body = z.object({ signals: TechSignalBagSchema }).parse(await res.json());
    expect(body.signals.technologies).toContain('shopify');
    expect(ctx.deps.fetch).toHaveBeenCalledWith('https://shop.example', expect.anything());
  });

  it('answers 503 when the website cannot be fetched', async () => {
    const res = await ctx.app.request(
      '/api/technographics/classify',
      jsonRequest('POST', { url: 'https://down.example' })
    );

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({
      code: 'SERVICE_UNAVAILABLE',
      error: 'website service error: could not inspect https://down.example',
    });
  });

  it('requires signals or a url', async () => {
    const res = await ctx.app.request('/api/technographics/classify', jsonRequest('POST', { company_name: 'Norte Ltda' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      details: { fields: { signals: ['either signals or url is required'] } },
    });
  });

  it('returns 404 for an unknown lead', async () => {
    const res = await ctx.app.request(
      '/api/technographics/classify',
      jsonRequest('POST', { lead_id: 'lead_missing', signals: AZURE_SIGNALS })
    );

    expect(res.status).toBe(404);
  });
});
