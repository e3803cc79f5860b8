import { errorMessage } from '../errors';
import type { HealthCheckConfig } from '../config';

export interface HealthStatus {
  healthy: boolean;
  statusCode?: number;
  error?: string;
  checkedAt: number;
}

export function buildHealthUrl(baseURL: string | undefined, healthEndpoint: string | undefined): string | undefined {
  if (!baseURL || !healthEndpoint) return undefined;

  const base = baseURL.replace(/\/+$/, '');
  const endpoint = healthEndpoint.startsWith('/') ? healthEndpoint : `/${healthEndpoint}`;
  return `${base}${endpoint}`;
}

function isAbort(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

/**
 * Probes health endpoints and remembers each answer for the configured TTL.
 * Read-only: it never touches the registry.
 */
export class HealthChecker {
  private cache = new Map<string, HealthStatus>();

  constructor(private readonly config: HealthCheckConfig) {}

  async check(url: string, options: { useCache?: boolean } = {}): Promise<HealthStatus> {
    const useCache = options.useCache ?? true;
    const cached = this.cache.get(url);
    if (useCache && cached && Date.now() - cached.checkedAt < this.config.cacheTtlSeconds * 1000) {
      return cached;
    }

    const status = await this.probe(url);
    this.cache.set(url, status);
    return status;
  }

  private async probe(url: string): Promise<HealthStatus> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const res = await fetch(url, { signal: controller.signal, redirect: 'manual' });
      await res.body?.cancel();
      return { healthy: res.status === 200, statusCode: res.status, checkedAt: Date.now() };
    } catch (error: unknown) {
      return {
        healthy: false,
        error: isAbort(error) ? 'Timeout' : errorMessage(error),
        checkedAt: Date.now(),
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}
