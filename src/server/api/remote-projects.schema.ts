import { z } from 'zod';

// Schema-only module for:
// - GET /api/quality/remote-projects
// - GET /api/quality/remote-branches

export const remoteProjectsQuerySchema = z.object({
  organization: z.string().min(1).optional(),
});

export const remoteBranchesQuerySchema = z.object({
  project: z.string().min(1),
});
