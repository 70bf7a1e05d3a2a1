import { z } from 'zod';

// Schema-only module for:
// - GET /api/quality/history

export const getQuerySchema = z.object({
  project: z.string().min(1),
  branch: z.string().min(1).optional(),
  since: z.string().datetime({ offset: true }).optional(),
  until: z.string().datetime({ offset: true }).optional(),
  days: z.coerce.number().int().min(1).max(3650).optional(),
  limit: z.coerce.number().int().min(1).optional(),
});
