import { NextResponse } from 'next/server';
import { isLogLevel, logger, type LogFilter } from '@/lib/logger';

export const dynamic = 'force-dynamic';

export async function GET(req: Request) {
  const url = new URL(req.url);
  const level = url.searchParams.get('level');
  const limit = parseInt(url.searchParams.get('limit') || '500', 10);

  const filter: LogFilter = {
    level: isLogLevel(level) ? level : undefined,
    tags: url.searchParams.getAll('tag'),
    search: url.searchParams.get('search') || undefined,
    limit: Number.isNaN(limit) ? 500 : Math.max(1, limit)
  };

  return NextResponse.json({
    success: true,
    logs: logger.queryLogs(filter)
  });
}
