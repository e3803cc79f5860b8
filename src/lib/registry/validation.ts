import { ValidationError } from '../errors';
import type { ServicePatch } from './types';

export interface ServiceCreateInput {
  name: string;
  description: string;
  baseURL: string;
  port?: number;
  healthEndpoint?: string;
}

export type ServiceUpdateInput = Omit<ServicePatch, 'lifecycleStage'>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

type FieldCheck<T> = (value: unknown) => { value: T } | { issue: string };

const checkPort: FieldCheck<number> = (value) =>
  typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= 65535
    ? { value }
    : { issue: 'port must be an integer between 1 and 65535' };

const checkHealthEndpoint: FieldCheck<string> = (value) =>
  typeof value === 'string' && value.startsWith('/')
    ? { value }
    : { issue: 'healthEndpoint must start with /' };

const checkBaseURL: FieldCheck<string> = (value) =>
  typeof value === 'string' && isHttpUrl(value)
    ? { value }
    : { issue: 'baseURL must be an absolute http:// or https:// URL' };

const checkDescription: FieldCheck<string> = (value) =>
  typeof value === 'string' && value.trim().length > 0
    ? { value }
    : { issue: 'description must be a non-empty string' };

const checkName: FieldCheck<string> = (value) =>
  typeof value === 'string' && value.trim().length > 0 && [...value].length <= 255
    ? { value }
    : { issue: 'name must be between 1 and 255 characters' };

class Collector {
  readonly issues: string[] = [];

  take<T>(check: FieldCheck<T>, value: unknown): T | undefined {
    const result = check(value);
    if ('issue' in result) {
      this.issues.push(result.issue);
      return undefined;
    }
    return result.value;
  }

  require(body: Record<string, unknown>, field: string): unknown {
    if (body[field] === undefined || body[field] === null) {
      this.issues.push(`${field} is required`);
      return undefined;
    }
    return body[field];
  }
}

/** Validates the body of a manual service registration. */
export function parseCreateInput(body: unknown): ServiceCreateInput {
  if (!isRecord(body)) throw new ValidationError(['body must be a JSON object']);
  const c = new Collector();

  const nameValue = c.require(body, 'name');
  const name = nameValue === undefined ? undefined : c.take(checkName, nameValue);
  const descriptionValue = c.require(body, 'description');
  const description = descriptionValue === undefined ? undefined : c.take(checkDescription, descriptionValue);
  const baseURLValue = c.require(body, 'baseURL');
  const baseURL = baseURLValue === undefined ? undefined : c.take(checkBaseURL, baseURLValue);
  const port = body.port === undefined || body.port === null ? undefined : c.take(checkPort, body.port);
  const healthEndpoint = body.healthEndpoint === undefined || body.healthEndpoint === null
    ? undefined
    : c.take(checkHealthEndpoint, body.healthEndpoint);

  if (c.issues.length > 0 || name === undefined || description === undefined || baseURL === undefined) {
    throw new ValidationError(c.issues);
  }
  return { name, description, baseURL, port, healthEndpoint };
}

/**
 * Validates a configuration update. Keys left out stay untouched, `null`
 * clears the field.
 */
export function parseUpdateInput(body: unknown): ServiceUpdateInput {
  if (!isRecord(body)) throw new ValidationError(['body must be a JSON object']);
  const c = new Collector();
  const input: ServiceUpdateInput = {};

  if ('description' in body) {
    input.description = body.description === null ? null : c.take(checkDescription, body.description);
  }
  if ('port' in body) {
    input.port = body.port === null ? null : c.take(checkPort, body.port);
  }
  if ('healthEndpoint' in body) {
    input.healthEndpoint = body.healthEndpoint === null ? null : c.take(checkHealthEndpoint, body.healthEndpoint);
  }
  if ('baseURL' in body) {
    input.baseURL = body.baseURL === null ? null : c.take(checkBaseURL, body.baseURL);
  }

  if (c.issues.length > 0) throw new ValidationError(c.issues);
  return input;
}
