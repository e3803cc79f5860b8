import { NotFoundError, RegistryConflictError } from '../errors';
import { logger } from '../logger';
import type { Reconciler } from '../discovery/reconciler';
import type { RegistryStore } from './store';
import type { LifecycleStage, ScanSummary, ServiceRecord } from './types';
import { parseCreateInput, parseUpdateInput } from './validation';

/** run state recorded for services registered by hand before any scan saw them */
export const UNKNOWN_RUN_STATE = 'unknown';

export class RegistryService {
  constructor(
    private readonly store: RegistryStore,
    private readonly reconciler: Reconciler
  ) {}

  scan(): Promise<ScanSummary> {
    return this.reconciler.scan();
  }

  get scanning(): boolean {
    return this.reconciler.scanning;
  }

  listServices(stage?: LifecycleStage): ServiceRecord[] {
    return this.store.list({ stage });
  }

  getConfiguredServices(): ServiceRecord[] {
    return this.store.list({ stage: 'configured' });
  }

  getDiscoveredServices(): ServiceRecord[] {
    return this.store.list({ stage: 'discovered' });
  }

  getService(id: number): ServiceRecord {
    const record = this.store.findById(id);
    if (!record) throw new NotFoundError();
    return record;
  }

  /** Registers a service by hand; it goes straight to the dashboard. */
  createService(body: unknown): ServiceRecord {
    const input = parseCreateInput(body);
    if (this.store.findByName(input.name)) {
      throw new RegistryConflictError(input.name);
    }

    const record = this.store.insert({
      ...input,
      lifecycleStage: 'configured',
      runState: UNKNOWN_RUN_STATE,
    });
    logger.info('Registry', `Registered ${record.name}`);
    return record;
  }

  /**
   * Applies user configuration and promotes the record to `configured`.
   * Later scans never overwrite what is set here.
   */
  configureService(id: number, body: unknown): ServiceRecord {
    const input = parseUpdateInput(body);
    const record = this.store.update(id, { ...input, lifecycleStage: 'configured' });
    if (!record) throw new NotFoundError();

    logger.info('Registry', `Configured ${record.name}`, Object.keys(input));
    return record;
  }

  deleteService(id: number): void {
    const record = this.getService(id);
    this.store.remove(id);
    logger.info('Registry', `Removed ${record.name}`);
  }
}
