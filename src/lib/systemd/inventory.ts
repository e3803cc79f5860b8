import type { Executor } from '../executor';
import { listListeningPorts, type PortBinding } from '../network/ports';
import { listUnits, type ObservedUnit, resolvePid } from './units';

/**
 * What a scan needs to know about the host. The reconciler only sees this
 * interface, so tests can hand it canned answers.
 */
export interface HostInventory {
  listUnits(): Promise<ObservedUnit[]>;
  listListeningPorts(): Promise<PortBinding[]>;
  resolvePid(unitName: string): Promise<number | undefined>;
}

export class SystemdInventory implements HostInventory {
  constructor(private readonly executor: Executor) {}

  listUnits() {
    return listUnits(this.executor);
  }

  listListeningPorts() {
    return listListeningPorts(this.executor);
  }

  resolvePid(unitName: string) {
    return resolvePid(this.executor, unitName);
  }
}
