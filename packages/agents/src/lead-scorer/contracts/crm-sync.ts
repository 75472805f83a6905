/**
 * CRM Sync Contract
 *
 * Shape returned by a CRM synchronization adapter for each scored lead.
 * The adapter itself (vendor client) lives outside this package.
 *
 * @module contracts/crm-sync
 */

import { z } from 'zod';

export const CrmSyncResultSchema = z.object({
  success: z.boolean(),
  company_id: z.string().optional(),
  contact_id: z.string().optional(),
  deal_id: z.string().optional(),
  errors: z.array(z.string()),
});

export type CrmSyncResult = z.infer<typeof CrmSyncResultSchema>;

export const CrmSyncRecordSchema = CrmSyncResultSchema.extend({
  lead_id: z.string(),
  company_name: z.string(),
  score: z.number(),
});

export type CrmSyncRecord = z.infer<typeof CrmSyncRecordSchema>;

export const CrmSyncSummarySchema = z.object({
  total: z.number().int().nonnegative(),
  qualified: z.number().int().nonnegative(),
  successful: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  results: z.array(CrmSyncRecordSchema),
});

export type CrmSyncSummary = z.infer<typeof CrmSyncSummarySchema>;
