import { NextRequest, NextResponse } from 'next/server';
import { getAuthContext } from '../lib/authz';
import { httpStatusOf } from '../lib/errors';
import { getQualityServices } from '../lib/services';
import { describeFailure } from '../lib/sync';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

function jsonError(message: string, status = 400) {
  return NextResponse.json({ error: message }, { status });
}

/** Known (project, branch) identities, read from the metadata index only. */
export async function GET(request: NextRequest) {
  const services = await getQualityServices().catch((err: unknown) => {
    console.error('[quality-metrics] Service setup failed:', err);
    return null;
  });
  if (!services) return jsonError('Quality metrics service is not configured', 503);

  const auth = getAuthContext(request, services.config.serviceToken);
  if (!auth) return jsonError('Unauthorized', 401);

  try {
    const { projects, truncated } = await services.store.listKnownProjects();
    return NextResponse.json({
      projects: projects.map((p) => ({ projectId: p.projectId, branch: p.branch, firstSeenAt: p.firstSeenAt })),
      truncated,
    });
  } catch (err) {
    services.logger.error('Listing projects failed:', err);
    return jsonError(describeFailure(err), httpStatusOf(err));
  }
}
