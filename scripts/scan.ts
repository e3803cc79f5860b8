// Runs one discovery scan against this host and prints the summary.
// Usage: npm run scan
import { loadEnvConfig } from '@next/env';
import { errorMessage } from '../src/lib/errors';
import { logger } from '../src/lib/logger';

const dev = process.env.NODE_ENV !== 'production';
loadEnvConfig(process.cwd(), dev, { info: (msg) => console.log(`[Env] ${msg}`), error: (err) => console.error(`[Env Error] ${err}`) });

async function main() {
  // Imported after the env files are loaded so DATA_DIR and friends see them.
  const { getRegistryContext } = await import('../src/lib/registry/instance');
  const { registry, store } = await getRegistryContext();
  try {
    const summary = await registry.scan();
    console.table([summary]);
    for (const service of registry.getDiscoveredServices()) {
      console.log(`  ${service.name.padEnd(40)} port ${service.port ?? '-'}  ${service.runState}`);
    }
  } finally {
    store.close();
  }
}

main().catch((error: unknown) => {
  logger.error('Scan', `Scan failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
