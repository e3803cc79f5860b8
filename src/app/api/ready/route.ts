import { NextResponse } from 'next/server';
import { errorMessage } from '@/lib/errors';
import { logger } from '@/lib/logger';
import { getRegistryContext } from '@/lib/registry/instance';

export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    const { store, registry } = await getRegistryContext();
    if (!store.ping()) {
      return NextResponse.json({ status: 'unavailable', error: 'Database did not answer' }, { status: 503 });
    }
    return NextResponse.json({ status: 'ready', scanning: registry.scanning });
  } catch (err) {
    logger.error('API', 'Readiness check failed:', err);
    return NextResponse.json({ status: 'unavailable', error: errorMessage(err) }, { status: 503 });
  }
}
