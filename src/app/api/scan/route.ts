import { NextResponse } from 'next/server';
import { errorMessage, ScanInProgressError } from '@/lib/errors';
import { getRegistryContext } from '@/lib/registry/instance';

export const dynamic = 'force-dynamic';

export async function POST() {
  try {
    const { registry } = await getRegistryContext();
    const stats = await registry.scan();
    return NextResponse.json({
      message: 'Scan completed successfully',
      stats,
      ...stats
    });
  } catch (err) {
    if (err instanceof ScanInProgressError) {
      return NextResponse.json({ error: err.message }, { status: 409 });
    }
    return NextResponse.json({ error: `Scan failed: ${errorMessage(err)}` }, { status: 500 });
  }
}
