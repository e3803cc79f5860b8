import { NextResponse } from 'next/server';
import { getDashboard } from '@/lib/dashboard';
import { toErrorResponse } from '@/lib/http';
import { getRegistryContext } from '@/lib/registry/instance';

export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    const { registry, healthChecker } = await getRegistryContext();
    const services = await getDashboard(registry, healthChecker);
    return NextResponse.json({ services });
  } catch (err) {
    return toErrorResponse(err, 'API:dashboard');
  }
}
