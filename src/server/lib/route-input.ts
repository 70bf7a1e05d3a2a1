import type { z } from 'zod';

export type ParsedInput<T> = { ok: true; data: T } | { ok: false; error: string };

/** Validate route input and flatten the first issue into a message for a 400. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): ParsedInput<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return { ok: true, data: parsed.data };
  const issue = parsed.error.issues[0];
  if (!issue) return { ok: false, error: 'Invalid input' };
  return { ok: false, error: issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message };
}
