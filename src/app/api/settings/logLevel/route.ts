import { NextResponse } from 'next/server';
import { updateConfig } from '@/lib/config';
import { errorMessage } from '@/lib/errors';
import { isLogLevel, logger } from '@/lib/logger';

export const dynamic = 'force-dynamic';

export async function GET() {
  return NextResponse.json({
    success: true,
    logLevel: logger.getLogLevel()
  });
}

export async function PUT(req: Request) {
  try {
    const body: unknown = await req.json();
    const logLevel = typeof body === 'object' && body !== null && 'logLevel' in body ? body.logLevel : undefined;

    if (!isLogLevel(logLevel)) {
      return NextResponse.json({
        success: false,
        error: 'logLevel must be one of debug, info, warn, error'
      }, { status: 400 });
    }

    logger.setLogLevel(logLevel);
    await updateConfig({ logLevel });
    logger.info('API', `Log level changed to: ${logLevel}`);

    return NextResponse.json({
      success: true,
      logLevel: logger.getLogLevel()
    });
  } catch (err) {
    logger.error('API', 'Failed to update log level:', err);
    return NextResponse.json({
      success: false,
      error: errorMessage(err)
    }, { status: 500 });
  }
}
