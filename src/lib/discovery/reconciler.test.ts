import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ExternalToolError, RegistryConflictError, ScanInProgressError } from '../errors';
import type { PortBinding } from '../network/ports';
import { RegistryService } from '../registry/service';
import { SqliteRegistryStore } from '../registry/store';
import type { HostInventory } from '../systemd/inventory';
import type { ObservedUnit } from '../systemd/units';
import { logger } from '../logger';
import { createFromObservation, observeExisting, Reconciler } from './reconciler';

vi.mock('../logger', () => ({
    logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    }
}));

interface FakeHost {
    units: ObservedUnit[];
    bindings: PortBinding[];
    pids: Record<string, number>;
}

function fakeInventory(host: FakeHost) {
    return {
        listUnits: vi.fn(async () => host.units.map(u => ({ ...u }))),
        listListeningPorts: vi.fn(async () => host.bindings.map(b => ({ ...b }))),
        resolvePid: vi.fn(async (name: string): Promise<number | undefined> => host.pids[name]),
    } satisfies HostInventory;
}

const T1 = '2026-01-05T10:00:00.000Z';
const T2 = '2026-01-05T11:00:00.000Z';
const T3 = '2026-01-05T12:00:00.000Z';

describe('Reconciler', () => {
    let clock: Date;
    let store: SqliteRegistryStore;
    let host: FakeHost;
    let inventory: ReturnType<typeof fakeInventory>;
    let reconciler: Reconciler;

    beforeEach(() => {
        clock = new Date(T1);
        store = new SqliteRegistryStore(':memory:', { now: () => clock });
        host = {
            units: [
                { name: 'nginx.service', runState: 'active', description: 'A high performance web server' },
                { name: 'ssh.service', runState: 'active', description: 'OpenBSD Secure Shell server' },
                { name: 'backup.service', runState: 'inactive', description: 'Nightly backup' },
            ],
            bindings: [
                { port: 80, ownerPid: 1234 },
                { port: 443, ownerPid: 1234 },
                { port: 22, ownerPid: 5678 },
            ],
            pids: { 'nginx.service': 1234, 'ssh.service': 5678 },
        };
        inventory = fakeInventory(host);
        reconciler = new Reconciler({ store, inventory, now: () => clock });
    });

    afterEach(() => {
        store.close();
    });

    it('creates discovered and raw records on the first scan', async () => {
        const summary = await reconciler.scan();

        expect(summary).toEqual({ totalScanned: 3, newDiscovered: 1, newRaw: 2, updated: 0 });

        expect(store.findByName('nginx.service')).toMatchObject({
            lifecycleStage: 'discovered',
            port: 80,
            description: 'A high performance web server',
            runState: 'active',
            lastScannedAt: T1,
        });

        const ssh = store.findByName('ssh.service');
        expect(ssh?.lifecycleStage).toBe('raw');
        expect(ssh?.port).toBeUndefined();
        expect(ssh?.description).toBeUndefined();

        expect(store.findByName('backup.service')).toMatchObject({ lifecycleStage: 'raw', runState: 'inactive' });
    });

    it('lists units and sockets once per scan and only resolves pids of new units', async () => {
        await reconciler.scan();
        await reconciler.scan();

        expect(inventory.listUnits).toHaveBeenCalledTimes(2);
        expect(inventory.listListeningPorts).toHaveBeenCalledTimes(2);
        expect(inventory.resolvePid).toHaveBeenCalledTimes(3);
    });

    it('is idempotent and leaves user fields alone on a rescan', async () => {
        await reconciler.scan();
        const nginx = store.findByName('nginx.service');
        store.update(nginx?.id ?? 0, { description: 'Edge proxy', baseURL: 'http://edge.local', healthEndpoint: '/status' });
        const before = store.list();

        clock = new Date(T2);
        const summary = await reconciler.scan();

        expect(summary).toEqual({ totalScanned: 3, newDiscovered: 0, newRaw: 0, updated: 3 });
        const after = store.list();
        expect(after).toHaveLength(3);
        expect(after.map(({ lastScannedAt, updatedAt, ...rest }) => rest))
            .toEqual(before.map(({ lastScannedAt, updatedAt, ...rest }) => rest));
        expect(after.every(r => r.lastScannedAt === T2)).toBe(true);
    });

    it('never reclassifies a configured service', async () => {
        const registry = new RegistryService(store, reconciler);

        await reconciler.scan();
        const nginx = store.findByName('nginx.service');
        expect(nginx).toMatchObject({ lifecycleStage: 'discovered', port: 80 });
        registry.configureService(nginx?.id ?? 0, { baseURL: 'http://host:80' });

        clock = new Date(T2);
        await reconciler.scan();

        host.units[0] = { name: 'nginx.service', runState: 'activating', description: 'A high performance web server' };
        host.pids['nginx.service'] = 4321;
        host.bindings = [{ port: 9090, ownerPid: 4321 }];
        clock = new Date(T3);
        await reconciler.scan();

        expect(store.findByName('nginx.service')).toMatchObject({
            lifecycleStage: 'configured',
            port: 80,
            baseURL: 'http://host:80',
            runState: 'activating',
            lastScannedAt: T3,
        });
    });

    it('treats a pid lookup failure as a unit that is not running', async () => {
        inventory.resolvePid.mockImplementation(async (name: string) => {
            if (name === 'nginx.service') {
                throw new ExternalToolError('systemctl show', 'systemctl show timed out after 10000ms');
            }
            return host.pids[name];
        });

        const summary = await reconciler.scan();

        expect(summary).toEqual({ totalScanned: 3, newDiscovered: 0, newRaw: 3, updated: 0 });
        expect(store.findByName('nginx.service')?.lifecycleStage).toBe('raw');
    });

    it('writes nothing when the unit listing fails', async () => {
        inventory.listUnits.mockRejectedValueOnce(
            new ExternalToolError('systemctl list-units', 'systemctl list-units exited with code 1: Failed to connect to bus', { exitCode: 1 })
        );

        await expect(reconciler.scan()).rejects.toThrow('Failed to connect to bus');
        expect(store.list()).toEqual([]);
    });

    it('leaves known records untouched when the socket listing fails', async () => {
        await reconciler.scan();
        host.units[1] = { name: 'ssh.service', runState: 'failed', description: 'OpenBSD Secure Shell server' };
        inventory.listListeningPorts.mockRejectedValueOnce(new ExternalToolError('ss -tlnpH', 'ss -tlnpH: command not found'));

        clock = new Date(T2);
        await expect(reconciler.scan()).rejects.toBeInstanceOf(ExternalToolError);

        expect(store.findByName('ssh.service')).toMatchObject({ runState: 'active', lastScannedAt: T1 });
    });

    it('rolls back the whole scan when the name constraint is violated', async () => {
        store.insert({ name: 'ssh.service', lifecycleStage: 'raw', runState: 'active' });
        host.units = [
            { name: 'ssh.service', runState: 'failed', description: 'OpenBSD Secure Shell server' },
            { name: 'web.service', runState: 'active', description: 'Web app' },
        ];
        // Another writer registers web.service between lookup and commit.
        inventory.resolvePid.mockImplementation(async (name: string) => {
            store.insert({ name, lifecycleStage: 'configured', runState: 'unknown' });
            return undefined;
        });

        await expect(reconciler.scan()).rejects.toBeInstanceOf(RegistryConflictError);

        expect(store.findByName('ssh.service')).toMatchObject({ runState: 'active', lastScannedAt: undefined });
        expect(store.findByName('web.service')).toMatchObject({ lifecycleStage: 'configured', runState: 'unknown' });
        expect(store.list()).toHaveLength(2);
    });

    it('rejects a scan while another one is running', async () => {
        let release: (units: ObservedUnit[]) => void = () => {};
        inventory.listUnits.mockImplementationOnce(() => new Promise<ObservedUnit[]>(resolve => { release = resolve; }));

        const first = reconciler.scan();
        expect(reconciler.scanning).toBe(true);
        await expect(reconciler.scan()).rejects.toBeInstanceOf(ScanInProgressError);

        release(host.units);
        await expect(first).resolves.toMatchObject({ totalScanned: 3 });
        expect(reconciler.scanning).toBe(false);
        await expect(reconciler.scan()).resolves.toMatchObject({ updated: 3 });
    });

    it('does not count a record deleted while the scan was running', async () => {
        await reconciler.scan();
        host.units.push({ name: 'web.service', runState: 'active', description: 'Web app' });
        inventory.resolvePid.mockImplementation(async () => {
            store.remove(store.findByName('ssh.service')?.id ?? 0);
            return undefined;
        });

        clock = new Date(T2);
        const summary = await reconciler.scan();

        expect(summary).toEqual({ totalScanned: 4, newDiscovered: 0, newRaw: 1, updated: 2 });
        expect(store.findByName('ssh.service')).toBeUndefined();
        expect(store.list().map(r => r.name)).toEqual(['nginx.service', 'backup.service', 'web.service']);
        expect(logger.warn).toHaveBeenCalledWith('Scan', 'Records removed during the scan were not updated: ssh.service');
    });

    it('creates a unit listed twice only once', async () => {
        host.units = [
            { name: 'dup.service', runState: 'active', description: 'Dup' },
            { name: 'dup.service', runState: 'failed', description: 'Dup' },
        ];

        const summary = await reconciler.scan();

        expect(summary).toEqual({ totalScanned: 2, newDiscovered: 0, newRaw: 1, updated: 1 });
        expect(store.list()).toHaveLength(1);
        expect(store.findByName('dup.service')?.runState).toBe('failed');
    });
});

describe('merge helpers', () => {
    const unit: ObservedUnit = { name: 'app.service', runState: 'active', description: 'App' };

    it('only carries observed fields for known records', () => {
        expect(observeExisting(unit, T1)).toEqual({
            kind: 'observe',
            name: 'app.service',
            runState: 'active',
            lastScannedAt: T1,
        });
    });

    it('copies the description only for discovered units', () => {
        expect(createFromObservation(unit, { stage: 'discovered', port: 3000 }, T1)).toEqual({
            name: 'app.service',
            description: 'App',
            port: 3000,
            lifecycleStage: 'discovered',
            runState: 'active',
            lastScannedAt: T1,
        });
        expect(createFromObservation(unit, { stage: 'raw' }, T1)).toEqual({
            name: 'app.service',
            description: undefined,
            port: undefined,
            lifecycleStage: 'raw',
            runState: 'active',
            lastScannedAt: T1,
        });
    });
});
