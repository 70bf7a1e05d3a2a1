import { NextRequest, NextResponse } from 'next/server';
import { getAuthContext } from '../lib/authz';
import { httpStatusOf } from '../lib/errors';
import { DEFAULT_BRANCH } from '../lib/records';
import { parseInput } from '../lib/route-input';
import { getQualityServices } from '../lib/services';
import { describeFailure } from '../lib/sync';
import { deleteQuerySchema } from './project-data.schema';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

function jsonError(message: string, status = 400) {
  return NextResponse.json({ error: message }, { status });
}

/** Removes the identity's stored rows. The project stays listed. */
export async function DELETE(request: NextRequest) {
  const services = await getQualityServices().catch((err: unknown) => {
    console.error('[quality-metrics] Service setup failed:', err);
    return null;
  });
  if (!services) return jsonError('Quality metrics service is not configured', 503);

  const auth = getAuthContext(request, services.config.serviceToken);
  if (!auth) return jsonError('Unauthorized', 401);

  const input = parseInput(deleteQuerySchema, Object.fromEntries(request.nextUrl.searchParams));
  if (!input.ok) return jsonError(input.error, 400);

  const branch = input.data.branch ?? DEFAULT_BRANCH;
  try {
    const deleted = await services.store.deleteProjectData(input.data.project, branch);
    services.logger.info(`Deleted ${deleted} row(s) of ${input.data.project} / ${branch}`);
    return NextResponse.json({ deleted });
  } catch (err) {
    services.logger.error('Deleting project data failed:', err);
    return jsonError(describeFailure(err), httpStatusOf(err));
  }
}
