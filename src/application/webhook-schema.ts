import { z } from 'zod';

/**
 * Body Tableau POSTs for a webhook event.
 *
 * Only `resource_luid` is needed downstream (the workbook id for
 * broadcast updates); the rest is kept for logging. Unknown keys pass
 * through so new Tableau fields do not break ingestion.
 */
export const tableauWebhookSchema = z
  .object({
    resource: z.string().min(1),
    event_type: z.string().min(1),
    resource_name: z.string().optional(),
    site_luid: z.string().optional(),
    resource_luid: z.string().min(1),
    created_at: z.string().optional(),
  })
  .passthrough();

export type TableauWebhook = z.infer<typeof tableauWebhookSchema>;
