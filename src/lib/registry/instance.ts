import fs from 'fs/promises';
import path from 'path';
import { getConfig } from '../config';
import { Reconciler } from '../discovery/reconciler';
import { LocalExecutor } from '../executor';
import { HealthChecker } from '../health/checker';
import { logger } from '../logger';
import { SystemdInventory } from '../systemd/inventory';
import { RegistryService } from './service';
import { type RegistryStore, SqliteRegistryStore } from './store';

export interface RegistryContext {
  store: RegistryStore;
  registry: RegistryService;
  healthChecker: HealthChecker;
}

declare global {
  var __registryContext: Promise<RegistryContext> | undefined;
}

async function createRegistryContext(): Promise<RegistryContext> {
  const config = await getConfig();
  logger.setLogLevel(config.logLevel);

  if (config.databasePath !== ':memory:') {
    await fs.mkdir(path.dirname(config.databasePath), { recursive: true });
  }
  const store = new SqliteRegistryStore(config.databasePath);
  const inventory = new SystemdInventory(new LocalExecutor(config.commandTimeoutMs));
  const reconciler = new Reconciler({ store, inventory });

  logger.info('Registry', `Using database ${config.databasePath}`);
  return {
    store,
    registry: new RegistryService(store, reconciler),
    healthChecker: new HealthChecker(config.health),
  };
}

/**
 * Process-wide registry, created on first use. Kept on globalThis so that
 * route modules reloaded in development share one database handle and one
 * scan guard.
 */
export function getRegistryContext(): Promise<RegistryContext> {
  if (!globalThis.__registryContext) {
    globalThis.__registryContext = createRegistryContext().catch((error: unknown) => {
      globalThis.__registryContext = undefined;
      throw error;
    });
  }
  return globalThis.__registryContext;
}
