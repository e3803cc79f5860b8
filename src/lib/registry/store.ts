import Database from 'better-sqlite3';
import { RegistryConflictError } from '../errors';
import type { LifecycleStage, NewServiceRecord, ScanChange, ScanCommit, ServicePatch, ServiceRecord, UserFields } from './types';

export interface ListFilter {
  stage?: LifecycleStage;
}

/**
 * Persistence for service records, keyed by unique name. Implementations
 * must apply a scan's changes all-or-nothing and report a taken name as
 * {@link RegistryConflictError}.
 */
export interface RegistryStore {
  findByName(name: string): ServiceRecord | undefined;
  findById(id: number): ServiceRecord | undefined;
  list(filter?: ListFilter): ServiceRecord[];
  insert(record: NewServiceRecord): ServiceRecord;
  update(id: number, patch: ServicePatch): ServiceRecord | undefined;
  remove(id: number): boolean;
  applyScan(changes: readonly ScanChange[]): ScanCommit;
  ping(): boolean;
  close(): void;
}

interface ServiceRow {
  id: number;
  name: string;
  description: string | null;
  port: number | null;
  health_endpoint: string | null;
  base_url: string | null;
  lifecycle_stage: LifecycleStage; // enforced by the CHECK constraint
  run_state: string;
  last_scanned_at: string | null;
  created_at: string;
  updated_at: string;
}

type InsertParams = Omit<ServiceRow, 'id'>;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS services (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    description TEXT,
    port INTEGER CHECK (port IS NULL OR port BETWEEN 1 AND 65535),
    health_endpoint TEXT,
    base_url TEXT,
    lifecycle_stage TEXT NOT NULL CHECK (lifecycle_stage IN ('raw', 'discovered', 'configured')),
    run_state TEXT NOT NULL,
    last_scanned_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_services_stage ON services(lifecycle_stage);
`;

const USER_COLUMNS: Record<UserFields, string> = {
  description: 'description',
  port: 'port',
  healthEndpoint: 'health_endpoint',
  baseURL: 'base_url',
};

const USER_FIELDS: readonly UserFields[] = ['description', 'port', 'healthEndpoint', 'baseURL'];

function rowToRecord(row: ServiceRow): ServiceRecord {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? undefined,
    port: row.port ?? undefined,
    healthEndpoint: row.health_endpoint ?? undefined,
    baseURL: row.base_url ?? undefined,
    lifecycleStage: row.lifecycle_stage,
    runState: row.run_state,
    lastScannedAt: row.last_scanned_at ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

export interface SqliteRegistryStoreOptions {
  now?: () => Date;
}

export class SqliteRegistryStore implements RegistryStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  private readonly statements: {
    byName: Database.Statement<[string], ServiceRow>;
    byId: Database.Statement<[number], ServiceRow>;
    all: Database.Statement<[], ServiceRow>;
    byStage: Database.Statement<[LifecycleStage], ServiceRow>;
    insert: Database.Statement<[InsertParams], ServiceRow>;
    observe: Database.Statement<[string, string, string, string]>;
    remove: Database.Statement<[number]>;
  };

  /** `filename` may be `':memory:'`. */
  constructor(filename: string, options: SqliteRegistryStoreOptions = {}) {
    this.db = new Database(filename);
    this.now = options.now ?? (() => new Date());

    if (filename !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(SCHEMA);

    this.statements = {
      byName: this.db.prepare<[string], ServiceRow>('SELECT * FROM services WHERE name = ?'),
      byId: this.db.prepare<[number], ServiceRow>('SELECT * FROM services WHERE id = ?'),
      all: this.db.prepare<[], ServiceRow>('SELECT * FROM services ORDER BY id'),
      byStage: this.db.prepare<[LifecycleStage], ServiceRow>('SELECT * FROM services WHERE lifecycle_stage = ? ORDER BY id'),
      insert: this.db.prepare<[InsertParams], ServiceRow>(`
        INSERT INTO services (name, description, port, health_endpoint, base_url, lifecycle_stage, run_state, last_scanned_at, created_at, updated_at)
        VALUES (@name, @description, @port, @health_endpoint, @base_url, @lifecycle_stage, @run_state, @last_scanned_at, @created_at, @updated_at)
        RETURNING *
      `),
      observe: this.db.prepare<[string, string, string, string]>(
        'UPDATE services SET run_state = ?, last_scanned_at = ?, updated_at = ? WHERE name = ?'
      ),
      remove: this.db.prepare<[number]>('DELETE FROM services WHERE id = ?'),
    };
  }

  findByName(name: string): ServiceRecord | undefined {
    const row = this.statements.byName.get(name);
    return row ? rowToRecord(row) : undefined;
  }

  findById(id: number): ServiceRecord | undefined {
    const row = this.statements.byId.get(id);
    return row ? rowToRecord(row) : undefined;
  }

  list(filter: ListFilter = {}): ServiceRecord[] {
    const rows = filter.stage ? this.statements.byStage.all(filter.stage) : this.statements.all.all();
    return rows.map(rowToRecord);
  }

  insert(record: NewServiceRecord): ServiceRecord {
    const timestamp = this.now().toISOString();
    const params: InsertParams = {
      name: record.name,
      description: record.description ?? null,
      port: record.port ?? null,
      health_endpoint: record.healthEndpoint ?? null,
      base_url: record.baseURL ?? null,
      lifecycle_stage: record.lifecycleStage,
      run_state: record.runState,
      last_scanned_at: record.lastScannedAt ?? null,
      created_at: timestamp,
      updated_at: timestamp,
    };

    try {
      const row = this.statements.insert.get(params);
      if (!row) {
        throw new Error(`Insert of ${record.name} returned no row`);
      }
      return rowToRecord(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new RegistryConflictError(record.name);
      }
      throw error;
    }
  }

  update(id: number, patch: ServicePatch): ServiceRecord | undefined {
    const assignments: string[] = [];
    const values: (string | number | null)[] = [];

    for (const field of USER_FIELDS) {
      if (!(field in patch)) continue;
      assignments.push(`${USER_COLUMNS[field]} = ?`);
      values.push(patch[field] ?? null);
    }
    if (patch.lifecycleStage) {
      assignments.push('lifecycle_stage = ?');
      values.push(patch.lifecycleStage);
    }

    assignments.push('updated_at = ?');
    values.push(this.now().toISOString());

    const row = this.db
      .prepare<(string | number | null)[], ServiceRow>(`UPDATE services SET ${assignments.join(', ')} WHERE id = ? RETURNING *`)
      .get(...values, id);
    return row ? rowToRecord(row) : undefined;
  }

  remove(id: number): boolean {
    return this.statements.remove.run(id).changes > 0;
  }

  /**
   * Writes a scan's changes in one transaction. Creates and observations are
   * applied in order, so an observation may target a record created earlier
   * in the same batch. Any failure rolls the whole batch back. Observations
   * of records that no longer exist are reported as missed.
   */
  applyScan(changes: readonly ScanChange[]): ScanCommit {
    const apply = this.db.transaction((batch: readonly ScanChange[]): ScanCommit => {
      const timestamp = this.now().toISOString();
      const result: ScanCommit = { observed: 0, missed: [] };
      for (const change of batch) {
        if (change.kind === 'create') {
          this.insert(change.record);
        } else if (this.statements.observe.run(change.runState, change.lastScannedAt, timestamp, change.name).changes > 0) {
          result.observed++;
        } else {
          result.missed.push(change.name);
        }
      }
      return result;
    });
    return apply(changes);
  }

  ping(): boolean {
    return this.db.prepare<[], { ok: number }>('SELECT 1 AS ok').get()?.ok === 1;
  }

  close(): void {
    this.db.close();
  }
}
