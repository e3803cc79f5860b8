import { NextResponse } from 'next/server';
import { errorMessage, NotFoundError, RegistryConflictError, ValidationError } from './errors';
import { logger } from './logger';

export function toErrorResponse(error: unknown, tag: string) {
  if (error instanceof ValidationError) {
    return NextResponse.json({ error: error.message, issues: error.issues }, { status: 400 });
  }
  if (error instanceof RegistryConflictError) {
    return NextResponse.json({ error: 'Service already exists' }, { status: 400 });
  }
  if (error instanceof NotFoundError) {
    return NextResponse.json({ error: error.message }, { status: 404 });
  }

  logger.error(tag, 'Request failed:', error);
  return NextResponse.json({ error: errorMessage(error) }, { status: 500 });
}

/** Path ids are positive integers; anything else cannot name a record. */
export function parseId(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined;
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : undefined;
}

export async function readJson(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new ValidationError(['body must be valid JSON']);
  }
}
