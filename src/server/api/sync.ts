import { NextRequest, NextResponse } from 'next/server';
import { getAuthContext } from '../lib/authz';
import { DEFAULT_BRANCH } from '../lib/records';
import { parseInput } from '../lib/route-input';
import { getQualityServices } from '../lib/services';
import { syncProject } from '../lib/sync';
import { postBodySchema } from './sync.schema';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

function jsonError(message: string, status = 400) {
  return NextResponse.json({ error: message }, { status });
}

export async function POST(request: NextRequest) {
  const services = await getQualityServices().catch((err: unknown) => {
    console.error('[quality-metrics] Service setup failed:', err);
    return null;
  });
  if (!services) return jsonError('Quality metrics service is not configured', 503);

  const auth = getAuthContext(request, services.config.serviceToken);
  if (!auth) return jsonError('Unauthorized', 401);

  const body: unknown = await request.json().catch(() => null);
  if (!body) return jsonError('Invalid JSON body', 400);
  const input = parseInput(postBodySchema, body);
  if (!input.ok) return jsonError(input.error, 400);

  const result = await syncProject(
    { store: services.store, source: services.client, logger: services.logger },
    {
      projectId: input.data.project,
      branch: input.data.branch ?? DEFAULT_BRANCH,
      days: input.data.days ?? services.config.sync.defaultDays,
      force: input.data.force,
      maxRows: input.data.limit,
      signal: request.signal,
    },
  );

  if (!result.ok) return jsonError(result.reason, result.code === 'validation' ? 400 : 502);
  return NextResponse.json(result);
}
