import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Reconciler, type ReconcilerConfig } from '../src/reconciler';
import { CustomConflictResolver } from '../src/conflict-resolvers';
import { RECONCILE_EVENT, RESOLUTION_STRATEGY, RESOURCE_STATUS, RUN_STATUS, SIDE } from '../src/enums';
import type { MemoryStoreAdapter } from '../src/adapters/memory-store';
import { PostgresStoreAdapter } from '../src/adapters/postgres-store';
import { ERROR_CODE } from '../src/errors';
import type { ErrorEntry } from '../src/types';
import { FakeQueryable, memoryStore, silentLogger } from './fixtures';

function reconciler(
    storeA: MemoryStoreAdapter,
    storeB: MemoryStoreAdapter,
    options: Partial<ReconcilerConfig> = {}
): Reconciler {
    return new Reconciler({ adapterA: storeA, adapterB: storeB, logger: silentLogger(), ...options });
}

describe('Reconciler', () => {
    let storeA: MemoryStoreAdapter;
    let storeB: MemoryStoreAdapter;

    beforeEach(() => {
        storeA = memoryStore('store-a', ['users', 'orders'], { users: { '1': { age: 30 } } });
        storeB = memoryStore('store-b', ['users', 'orders'], { users: { '1': { age: 31 }, '2': { name: 'x' } } });
    });

    describe('a_wins run', () => {
        it('should converge both stores', async () => {
            const report = await reconciler(storeA, storeB, { strategy: RESOLUTION_STRATEGY.A_WINS }).run(['users']);

            for (const store of [storeA, storeB]) {
                expect(store.get('users', '1')).toEqual({ age: 30 });
                expect(store.get('users', '2')).toEqual({ name: 'x' });
                expect(store.getRecordCount('users')).toBe(2);
            }

            expect(report.status).toBe(RUN_STATUS.SUCCESS);
            expect(report.strategy).toBe('a_wins');
            expect(report.resources).toEqual([
                {
                    resourceType: 'users',
                    status: RESOURCE_STATUS.RECONCILED,
                    common: 1,
                    onlyA: 0,
                    onlyB: 1,
                    conflicts: 1,
                    conflictDetails: [{ key: '1', fieldsChanged: ['age'] }],
                    updated: 1,
                    created: 1,
                    skipped: 0,
                    errors: 0,
                },
            ]);
            expect(report.totals).toEqual({ updated: 1, created: 1, skipped: 0, errors: 0 });
            expect(report.errors).toEqual([]);
        });

        it('should write nothing on a second run', async () => {
            const first = reconciler(storeA, storeB, { strategy: RESOLUTION_STRATEGY.A_WINS });
            await first.run(['users']);

            const applyA = vi.spyOn(storeA, 'apply');
            const applyB = vi.spyOn(storeB, 'apply');
            const second = await reconciler(storeA, storeB, { strategy: RESOLUTION_STRATEGY.A_WINS }).run(['users']);

            expect(applyA).not.toHaveBeenCalled();
            expect(applyB).not.toHaveBeenCalled();
            expect(second.resources[0]).toMatchObject({ common: 2, onlyA: 0, onlyB: 0, conflicts: 0 });
            expect(second.totals).toEqual({ updated: 0, created: 0, skipped: 0, errors: 0 });
        });
    });

    describe('failures', () => {
        it('should report a partial run when one resource type is unavailable', async () => {
            storeA.put('orders', 'o1', { total: 10 });
            storeB.setUnavailable('orders');

            const report = await reconciler(storeA, storeB, { strategy: RESOLUTION_STRATEGY.A_WINS }).run([
                'users',
                'orders',
            ]);

            expect(report.status).toBe(RUN_STATUS.PARTIAL);
            expect(report.resources.map(resource => [resource.resourceType, resource.status])).toEqual([
                ['users', RESOURCE_STATUS.RECONCILED],
                ['orders', RESOURCE_STATUS.FAILED],
            ]);
            expect(report.resources[1]?.failure).toEqual({
                resourceType: 'orders',
                code: 'STORE_UNAVAILABLE',
                message: 'store-b unavailable for "orders": store marked unavailable',
            });
            expect(storeB.get('users', '1')).toEqual({ age: 30 });
            expect(storeB.get('orders', 'o1')).toBeUndefined();
        });

        it('should fail the run when every resource type fails', async () => {
            storeA.setUnavailable('users');
            const report = await reconciler(storeA, storeB).run(['users']);

            expect(report.status).toBe(RUN_STATUS.FAILED);
            expect(report.totals.errors).toBe(1);
        });

        it('should fail a resource type a store does not declare', async () => {
            const storeC = memoryStore('store-c', ['users']);
            const report = await reconciler(storeA, storeC).run(['users', 'orders']);

            expect(report.status).toBe(RUN_STATUS.PARTIAL);
            expect(report.resources[1]).toMatchObject({
                resourceType: 'orders',
                status: RESOURCE_STATUS.FAILED,
                failure: {
                    resourceType: 'orders',
                    code: 'UNKNOWN_RESOURCE_TYPE',
                    message: 'store-c does not declare resource type "orders"',
                },
            });
        });

        it('should report a partial run when a write fails', async () => {
            storeA.failApplyFor('users', '2');
            const report = await reconciler(storeA, storeB, { strategy: RESOLUTION_STRATEGY.A_WINS }).run(['users']);

            expect(report.status).toBe(RUN_STATUS.PARTIAL);
            expect(report.resources[0]).toMatchObject({ status: RESOURCE_STATUS.RECONCILED, updated: 1, errors: 1 });
        });
    });

    describe('latest_wins', () => {
        beforeEach(() => {
            storeA = memoryStore('store-a', ['users'], { users: { '1': { payload: { v: 'a' }, modifiedAt: 1000 } } });
            storeB = memoryStore('store-b', ['users'], { users: { '1': { payload: { v: 'b' }, modifiedAt: 1000 } } });
        });

        it('should give ties to side A by default', async () => {
            await reconciler(storeA, storeB).run(['users']);
            expect(storeA.get('users', '1')).toEqual({ v: 'a' });
            expect(storeB.get('users', '1')).toEqual({ v: 'a' });
        });

        it('should give ties to the configured primary side', async () => {
            await reconciler(storeA, storeB, { primarySide: SIDE.B }).run(['users']);
            expect(storeA.get('users', '1')).toEqual({ v: 'b' });
        });

        it('should pick the newer record', async () => {
            storeB.put('users', '1', { v: 'b2' }, 2000);
            await reconciler(storeA, storeB).run(['users']);
            expect(storeA.get('users', '1')).toEqual({ v: 'b2' });
        });
    });

    describe('propagation', () => {
        it('should copy exclusive records whatever the strategy', async () => {
            storeA.put('users', '9', { name: 'only-a' });
            await reconciler(storeA, storeB, { strategy: RESOLUTION_STRATEGY.B_WINS }).run(['users']);

            expect(storeB.get('users', '9')).toEqual({ name: 'only-a' });
            expect(storeA.get('users', '2')).toEqual({ name: 'x' });
            expect(storeA.get('users', '1')).toEqual({ age: 31 });
        });

        it('should leave conflicts a custom resolver skips', async () => {
            const report = await reconciler(storeA, storeB, {
                conflictResolver: new CustomConflictResolver(() => 'skip'),
            }).run(['users']);

            expect(report.strategy).toBe('custom');
            expect(storeA.get('users', '1')).toEqual({ age: 30 });
            expect(storeB.get('users', '1')).toEqual({ age: 31 });
            expect(report.totals).toEqual({ updated: 0, created: 1, skipped: 1, errors: 0 });
        });
    });

    describe('dry run', () => {
        it('should plan without writing', async () => {
            const report = await reconciler(storeA, storeB, { dryRun: true }).run(['users']);

            expect(storeA.getRecordCount('users')).toBe(1);
            expect(storeB.get('users', '1')).toEqual({ age: 31 });
            expect(report.status).toBe(RUN_STATUS.SUCCESS);
            expect(report.dryRun).toBe(true);
            expect(report.resources[0]).toMatchObject({ status: RESOURCE_STATUS.PLANNED, skipped: 2, conflicts: 1 });
        });
    });

    describe('concurrency', () => {
        it('should keep the requested order in the report', async () => {
            const types = ['t1', 't2', 't3', 't4'];
            const a = memoryStore('a', types, { t3: { k: { v: 1 } } });
            const b = memoryStore('b', types, { t1: { k: { v: 1 } } });

            const report = await reconciler(a, b, { concurrency: 3 }).run(types);

            expect(report.resources.map(resource => resource.resourceType)).toEqual(types);
            expect(report.totals.created).toBe(2);
        });

        it('should report a repeated resource type once', async () => {
            const report = await reconciler(storeA, storeB).run(['users', 'users']);
            expect(report.resources).toHaveLength(1);
        });
    });

    describe('report log', () => {
        it('should keep the latest entries up to the tail size', async () => {
            const report = await reconciler(storeA, storeB, { logTailSize: 2, strategy: RESOLUTION_STRATEGY.A_WINS }).run([
                'users',
            ]);

            expect(report.log.map(entry => entry.message)).toEqual([
                'Updated users/1 in B (A wins)',
                'Created users/2 in A',
            ]);
        });

        it('should stamp the run with the injected clock', async () => {
            let tick = 100;
            const report = await reconciler(storeA, storeB, { clock: () => tick++ }).run(['users']);

            expect(report.startedAt).toBe(100);
            expect(report.finishedAt).toBeGreaterThan(report.startedAt);
        });
    });

    describe('events', () => {
        it('should emit events in run order', async () => {
            const instance = reconciler(storeA, storeB, { strategy: RESOLUTION_STRATEGY.A_WINS });
            const seen: string[] = [];
            for (const event of Object.values(RECONCILE_EVENT)) {
                instance.on(event, () => seen.push(event));
            }

            await instance.run(['users']);

            expect(seen).toEqual([
                'run:started',
                'scan:completed',
                'conflict:detected',
                'record:applied',
                'record:applied',
                'run:completed',
            ]);
        });

        it('should stop notifying after unsubscribe', async () => {
            const instance = reconciler(storeA, storeB);
            const listener = vi.fn();
            const unsubscribe = instance.on(RECONCILE_EVENT.RUN_COMPLETED, listener);
            unsubscribe();

            await instance.run(['users']);
            expect(listener).not.toHaveBeenCalled();
        });

        it('should carry the report on run:completed', async () => {
            const instance = reconciler(storeA, storeB);
            const listener = vi.fn();
            instance.on(RECONCILE_EVENT.RUN_COMPLETED, listener);

            const report = await instance.run(['users']);
            expect(listener).toHaveBeenCalledWith({ report });
        });
    });

    describe('backups', () => {
        let baseDir: string;

        beforeEach(async () => {
            baseDir = await mkdtemp(join(tmpdir(), 'reconciler-test-'));
        });

        afterEach(async () => {
            await rm(baseDir, { recursive: true, force: true });
        });

        it('should snapshot each store before its first write', async () => {
            const report = await reconciler(storeA, storeB, {
                strategy: RESOLUTION_STRATEGY.A_WINS,
                backup: true,
                backupDir: baseDir,
            }).run(['users']);

            expect(report.backups.map(backup => backup.store).sort()).toEqual(['store-a', 'store-b']);

            const snapshotB = report.backups.find(backup => backup.store === 'store-b');
            const document: unknown = JSON.parse(await readFile(snapshotB?.path ?? '', 'utf8'));
            expect(document).toMatchObject({
                store: 'store-b',
                resources: {
                    users: {
                        records: [
                            { key: '1', payload: { age: 31 } },
                            { key: '2', payload: { name: 'x' } },
                        ],
                    },
                },
            });
        });

        it('should take no snapshot on a dry run', async () => {
            const report = await reconciler(storeA, storeB, { dryRun: true, backup: true, backupDir: baseDir }).run([
                'users',
            ]);
            expect(report.backups).toEqual([]);
        });
    });

    describe('malformed records', () => {
        it('should report rows a store drops for lacking a key', async () => {
            const database = new FakeQueryable();
            database.seed('users', 'id', [
                { id: '1', age: 30 },
                { id: null, age: 5 },
            ]);
            const storeDb = new PostgresStoreAdapter({
                name: 'crm-db',
                client: database,
                logger: silentLogger(),
                tables: { users: { table: 'users', keyColumn: 'id', columns: ['age'] } },
            });
            const dropped: ErrorEntry[] = [];

            const run = new Reconciler({
                adapterA: storeDb,
                adapterB: storeB,
                strategy: RESOLUTION_STRATEGY.A_WINS,
                logger: silentLogger(),
            });
            run.on(RECONCILE_EVENT.RECORD_DROPPED, ({ error }) => dropped.push(error));
            const report = await run.run(['users']);

            const expected: ErrorEntry = {
                resourceType: 'users',
                code: ERROR_CODE.MALFORMED_RECORD,
                message: 'Malformed record from crm-db in "users": row has no "id"',
            };
            expect(report.status).toBe(RUN_STATUS.PARTIAL);
            expect(report.errors).toEqual([expected]);
            expect(report.resources[0]).toMatchObject({ common: 1, onlyA: 0, onlyB: 1, errors: 1 });
            expect(report.log).toContainEqual(
                expect.objectContaining({ level: 'warn', resourceType: 'users', message: expected.message })
            );
            expect(dropped).toEqual([expected]);
        });
    });
});
