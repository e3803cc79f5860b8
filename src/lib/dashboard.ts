import { buildHealthUrl, type HealthChecker } from './health/checker';
import type { RegistryService } from './registry/service';

export type DashboardHealth = 'healthy' | 'unhealthy' | 'unknown';

export interface DashboardEntry {
  id: number;
  name: string;
  description?: string;
  baseURL?: string;
  healthUrl?: string;
  healthStatus: DashboardHealth;
}

/** Configured services, each with the (cached) result of its health probe. */
export async function getDashboard(registry: RegistryService, checker: Pick<HealthChecker, 'check'>): Promise<DashboardEntry[]> {
  const services = registry.getConfiguredServices();

  return Promise.all(services.map(async (service): Promise<DashboardEntry> => {
    const healthUrl = buildHealthUrl(service.baseURL, service.healthEndpoint);
    let healthStatus: DashboardHealth = 'unknown';
    if (healthUrl) {
      const health = await checker.check(healthUrl);
      healthStatus = health.healthy ? 'healthy' : 'unhealthy';
    }

    return {
      id: service.id,
      name: service.name,
      description: service.description,
      baseURL: service.baseURL,
      healthUrl,
      healthStatus,
    };
  }));
}
