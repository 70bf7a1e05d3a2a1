import { z } from 'zod';

// Schema-only module for:
// - POST /api/quality/sync

export const postBodySchema = z.object({
  project: z.string().min(1),
  branch: z.string().min(1).optional(),
  days: z.number().int().min(1).max(3650).optional(),
  force: z.boolean().optional().default(false),
  limit: z.number().int().min(1).optional(),
});
