import { NextRequest, NextResponse } from 'next/server';
import { getAuthContext } from '../lib/authz';
import { httpStatusOf } from '../lib/errors';
import { DEFAULT_BRANCH } from '../lib/records';
import { parseInput } from '../lib/route-input';
import { getQualityServices } from '../lib/services';
import { describeFailure } from '../lib/sync';
import { getQuerySchema } from './history.schema';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

const DAY_MS = 24 * 60 * 60 * 1000;

function jsonError(message: string, status = 400) {
  return NextResponse.json({ error: message }, { status });
}

/**
 * Stored rows of one identity. The window is `since`..`until`, or the last
 * `days` (default from config) before `until`.
 */
export async function GET(request: NextRequest) {
  const services = await getQualityServices().catch((err: unknown) => {
    console.error('[quality-metrics] Service setup failed:', err);
    return null;
  });
  if (!services) return jsonError('Quality metrics service is not configured', 503);

  const auth = getAuthContext(request, services.config.serviceToken);
  if (!auth) return jsonError('Unauthorized', 401);

  const input = parseInput(getQuerySchema, Object.fromEntries(request.nextUrl.searchParams));
  if (!input.ok) return jsonError(input.error, 400);
  const q = input.data;

  const until = q.until ? new Date(q.until) : new Date();
  const since = q.since
    ? new Date(q.since)
    : new Date(until.getTime() - (q.days ?? services.config.sync.defaultDays) * DAY_MS);
  if (since > until) return jsonError('since must not be after until', 400);

  try {
    const result = await services.store.readRange(q.project, q.branch ?? DEFAULT_BRANCH, since, until, q.limit);
    return NextResponse.json(result);
  } catch (err) {
    services.logger.error('Reading history failed:', err);
    return jsonError(describeFailure(err), httpStatusOf(err));
  }
}
