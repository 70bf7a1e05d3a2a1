import { NextRequest, NextResponse } from 'next/server';
import { getAuthContext } from '../lib/authz';
import { httpStatusOf } from '../lib/errors';
import { parseInput } from '../lib/route-input';
import { getQualityServices } from '../lib/services';
import { describeFailure } from '../lib/sync';
import { remoteProjectsQuerySchema } from './remote-projects.schema';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

function jsonError(message: string, status = 400) {
  return NextResponse.json({ error: message }, { status });
}

export async function GET(request: NextRequest) {
  const services = await getQualityServices().catch((err: unknown) => {
    console.error('[quality-metrics] Service setup failed:', err);
    return null;
  });
  if (!services) return jsonError('Quality metrics service is not configured', 503);

  const auth = getAuthContext(request, services.config.serviceToken);
  if (!auth) return jsonError('Unauthorized', 401);

  const input = parseInput(remoteProjectsQuerySchema, Object.fromEntries(request.nextUrl.searchParams));
  if (!input.ok) return jsonError(input.error, 400);

  if (!services.client) return jsonError('Remote fetching is not configured', 503);
  const organization = input.data.organization ?? services.config.sonarcloud.organization;
  if (!organization) return jsonError('Missing organization', 400);

  try {
    const projects = await services.client.listProjects(organization, { signal: request.signal });
    return NextResponse.json({ organization, projects });
  } catch (err) {
    services.logger.error('Listing remote projects failed:', err);
    return jsonError(describeFailure(err), httpStatusOf(err));
  }
}
