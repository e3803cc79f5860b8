export const LIFECYCLE_STAGES = ['raw', 'discovered', 'configured'] as const;

export type LifecycleStage = typeof LIFECYCLE_STAGES[number];

export function isLifecycleStage(value: unknown): value is LifecycleStage {
  return LIFECYCLE_STAGES.some(stage => stage === value);
}

export interface ServiceRecord {
  id: number;
  name: string;
  description?: string;
  port?: number;
  healthEndpoint?: string;
  baseURL?: string;
  lifecycleStage: LifecycleStage;
  runState: string;
  lastScannedAt?: string;
  createdAt: string;
  updatedAt: string;
}

export type NewServiceRecord = Omit<ServiceRecord, 'id' | 'createdAt' | 'updatedAt'>;

/** Fields a user curates. `null` clears a field, a missing key leaves it alone. */
export type UserFields = 'description' | 'port' | 'healthEndpoint' | 'baseURL';

export type ServicePatch = {
  [K in UserFields]?: ServiceRecord[K] | null;
} & {
  lifecycleStage?: LifecycleStage;
};

/**
 * One write produced by a scan. Updates only ever carry observed fields, so
 * user configuration cannot be touched by reconciliation.
 */
export type ScanChange =
  | { kind: 'create'; record: NewServiceRecord }
  | { kind: 'observe'; name: string; runState: string; lastScannedAt: string };

/** What a committed scan batch actually touched. */
export interface ScanCommit {
  observed: number;
  missed: string[];
}

export interface ScanSummary {
  totalScanned: number;
  newDiscovered: number;
  newRaw: number;
  updated: number;
}
