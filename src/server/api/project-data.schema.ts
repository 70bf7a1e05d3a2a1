import { z } from 'zod';

// Schema-only module for:
// - DELETE /api/quality/project-data

export const deleteQuerySchema = z.object({
  project: z.string().min(1),
  branch: z.string().min(1).optional(),
});
