import { errorMessage, ScanInProgressError } from '../errors';
import { logger } from '../logger';
import { indexByPid } from '../network/ports';
import type { RegistryStore } from '../registry/store';
import type { NewServiceRecord, ScanChange, ScanSummary } from '../registry/types';
import type { HostInventory } from '../systemd/inventory';
import type { ObservedUnit } from '../systemd/units';
import { type Classification, classifyUnit } from './classifier';

/** A record the registry already knows: only observed fields move. */
export function observeExisting(unit: ObservedUnit, now: string): ScanChange {
  return { kind: 'observe', name: unit.name, runState: unit.runState, lastScannedAt: now };
}

/**
 * Builds the record for a unit seen for the first time. The description is
 * only kept for web services, raw units stay unlabelled.
 */
export function createFromObservation(unit: ObservedUnit, classification: Classification, now: string): NewServiceRecord {
  const discovered = classification.stage === 'discovered';
  return {
    name: unit.name,
    description: discovered && unit.description ? unit.description : undefined,
    port: discovered ? classification.port : undefined,
    lifecycleStage: classification.stage,
    runState: unit.runState,
    lastScannedAt: now,
  };
}

export interface ReconcilerOptions {
  store: RegistryStore;
  inventory: HostInventory;
  now?: () => Date;
}

export class Reconciler {
  private readonly store: RegistryStore;
  private readonly inventory: HostInventory;
  private readonly now: () => Date;
  private isRunning = false;

  constructor(options: ReconcilerOptions) {
    this.store = options.store;
    this.inventory = options.inventory;
    this.now = options.now ?? (() => new Date());
  }

  get scanning(): boolean {
    return this.isRunning;
  }

  /**
   * Merges the host's current units into the registry. Units and sockets
   * are listed once per scan; nothing is written until every host call has
   * returned, and then everything is written in one transaction.
   */
  async scan(): Promise<ScanSummary> {
    if (this.isRunning) throw new ScanInProgressError();
    this.isRunning = true;
    const started = Date.now();

    try {
      const [units, bindings] = await Promise.all([
        this.inventory.listUnits(),
        this.inventory.listListeningPorts(),
      ]);
      const portIndex = indexByPid(bindings);
      const now = this.now().toISOString();

      const summary: ScanSummary = { totalScanned: units.length, newDiscovered: 0, newRaw: 0, updated: 0 };
      const changes: ScanChange[] = [];
      const created = new Set<string>();

      for (const unit of units) {
        if (created.has(unit.name) || this.store.findByName(unit.name)) {
          changes.push(observeExisting(unit, now));
          summary.updated++;
          continue;
        }

        const classification = classifyUnit(await this.lookupPid(unit.name), portIndex);
        changes.push({ kind: 'create', record: createFromObservation(unit, classification, now) });
        created.add(unit.name);

        if (classification.stage === 'discovered') {
          summary.newDiscovered++;
        } else {
          summary.newRaw++;
        }
      }

      const commit = this.store.applyScan(changes);
      if (commit.missed.length > 0) {
        logger.warn('Scan', `Records removed during the scan were not updated: ${commit.missed.join(', ')}`);
      }
      summary.updated = commit.observed;
      logger.info('Scan', `Scanned ${summary.totalScanned} units in ${Date.now() - started}ms`, summary);
      return summary;
    } catch (error) {
      logger.error('Scan', `Scan failed: ${errorMessage(error)}`);
      throw error;
    } finally {
      this.isRunning = false;
    }
  }

  // A unit whose PID cannot be read is treated as not running.
  private async lookupPid(unitName: string): Promise<number | undefined> {
    try {
      return await this.inventory.resolvePid(unitName);
    } catch (error) {
      logger.warn('Scan', `Could not resolve main PID of ${unitName}: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
