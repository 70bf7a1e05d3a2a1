import { z } from 'zod';

// Response shapes of the analysis service endpoints the fetcher reads.

const pagingSchema = z.object({
  pageIndex: z.number().optional(),
  pageSize: z.number().optional(),
  total: z.number(),
});

export const projectsSearchSchema = z.object({
  paging: pagingSchema.optional(),
  components: z
    .array(
      z.object({
        key: z.string(),
        name: z.string().optional(),
      }),
    )
    .default([]),
});

export const projectBranchesSchema = z.object({
  branches: z
    .array(
      z.object({
        name: z.string(),
        isMain: z.boolean().optional(),
        type: z.string().optional(),
        analysisDate: z.string().optional(),
      }),
    )
    .default([]),
});

export const searchHistorySchema = z.object({
  paging: pagingSchema.optional(),
  measures: z
    .array(
      z.object({
        metric: z.string(),
        history: z
          .array(
            z.object({
              date: z.string(),
              value: z.string().optional(),
            }),
          )
          .default([]),
      }),
    )
    .default([]),
});

export const componentMeasuresSchema = z.object({
  component: z.object({
    key: z.string(),
    measures: z
      .array(
        z.object({
          metric: z.string(),
          value: z.string().optional(),
        }),
      )
      .default([]),
  }),
});

export type RemoteProject = z.infer<typeof projectsSearchSchema>['components'][number];
export type RemoteBranch = z.infer<typeof projectBranchesSchema>['branches'][number];
