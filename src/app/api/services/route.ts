import { NextResponse } from 'next/server';
import { toErrorResponse, readJson } from '@/lib/http';
import { getRegistryContext } from '@/lib/registry/instance';
import { isLifecycleStage } from '@/lib/registry/types';

export const dynamic = 'force-dynamic';

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  const stage = searchParams.get('stage');

  if (stage !== null && !isLifecycleStage(stage)) {
    return NextResponse.json({ error: `Unknown stage: ${stage}` }, { status: 400 });
  }

  try {
    const { registry } = await getRegistryContext();
    return NextResponse.json(registry.listServices(stage ?? undefined));
  } catch (err) {
    return toErrorResponse(err, 'API:services');
  }
}

export async function POST(request: Request) {
  try {
    const body = await readJson(request);
    const { registry } = await getRegistryContext();
    const service = registry.createService(body);
    return NextResponse.json(service, { status: 201 });
  } catch (err) {
    return toErrorResponse(err, 'API:services');
  }
}
