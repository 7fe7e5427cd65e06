import { describe, it, expect, vi } from 'vitest';
import { ResolutionEngine } from '../src/resolution-engine';
import { ReportBuilder } from '../src/report-builder';
import { ReconcileEventEmitter } from '../src/event-emitter';
import { CustomConflictResolver, SideWinsResolver } from '../src/conflict-resolvers';
import { detectConflicts } from '../src/conflict-detector';
import { scanIntersection } from '../src/intersection-scanner';
import { RECONCILE_EVENT, SIDE } from '../src/enums';
import type { ConflictResolver } from '../src/interfaces';
import type { MemoryStoreAdapter } from '../src/adapters/memory-store';
import { memoryStore, silentLogger } from './fixtures';

interface EngineSetup {
  storeA: MemoryStoreAdapter;
  storeB: MemoryStoreAdapter;
  resolver?: ConflictResolver;
  dryRun?: boolean;
}

function setup({ storeA, storeB, resolver = new SideWinsResolver(SIDE.A), dryRun = false }: EngineSetup) {
  const report = new ReportBuilder({
    resourceTypes: ['users'],
    strategy: 'test',
    dryRun,
    logTailSize: 50,
    logger: silentLogger(),
  });
  const events = new ReconcileEventEmitter();
  const engine = new ResolutionEngine({
    adapterA: storeA,
    adapterB: storeB,
    resolver,
    primarySide: SIDE.A,
    dryRun,
    report,
    events,
  });
  return { report, events, engine };
}

async function resolveUsers(engine: ResolutionEngine, storeA: MemoryStoreAdapter, storeB: MemoryStoreAdapter) {
  const scan = await scanIntersection(storeA, storeB, 'users');
  await engine.resolve(scan, detectConflicts(scan));
}

describe('ResolutionEngine', () => {
  it('should overwrite the losing side and propagate exclusive records both ways', async () => {
    const storeA = memoryStore('a', ['users'], { users: { '1': { age: 30 }, '3': { name: 'only-a' } } });
    const storeB = memoryStore('b', ['users'], { users: { '1': { age: 31 }, '2': { name: 'x' } } });
    const { report, engine } = setup({ storeA, storeB });

    await resolveUsers(engine, storeA, storeB);

    expect(storeB.get('users', '1')).toEqual({ age: 30 });
    expect(storeB.get('users', '3')).toEqual({ name: 'only-a' });
    expect(storeA.get('users', '2')).toEqual({ name: 'x' });

    const [users] = report.build().resources;
    expect(users).toMatchObject({ updated: 1, created: 2, skipped: 0, errors: 0 });
  });

  it('should plan conflicts first, then onlyA and onlyB keys', async () => {
    const storeA = memoryStore('a', ['users'], { users: { c: { v: 1 }, a: { v: 1 } } });
    const storeB = memoryStore('b', ['users'], { users: { c: { v: 2 }, b: { v: 2 } } });
    const { engine } = setup({ storeA, storeB });

    const scan = await scanIntersection(storeA, storeB, 'users');
    const actions = await engine.plan(scan, detectConflicts(scan));

    expect(actions.map(action => [action.kind, action.key, action.from])).toEqual([
      ['resolve', 'c', SIDE.A],
      ['propagate', 'a', SIDE.A],
      ['propagate', 'b', SIDE.B],
    ]);
  });

  it('should keep going after a failed write', async () => {
    const storeA = memoryStore('a', ['users'], { users: { '1': { v: 1 }, '2': { v: 2 }, '3': { v: 3 } } });
    const storeB = memoryStore('b', ['users']);
    storeB.failApplyFor('users', '2');
    const { report, events, engine } = setup({ storeA, storeB });
    const failed = vi.fn();
    events.on(RECONCILE_EVENT.APPLY_FAILED, failed);

    await resolveUsers(engine, storeA, storeB);

    expect(storeB.get('users', '1')).toEqual({ v: 1 });
    expect(storeB.get('users', '2')).toBeUndefined();
    expect(storeB.get('users', '3')).toEqual({ v: 3 });

    const built = report.build();
    expect(built.resources[0]).toMatchObject({ created: 2, errors: 1 });
    expect(built.errors).toEqual([
      {
        resourceType: 'users',
        key: '2',
        code: 'APPLY_FAILED',
        message: 'Failed to apply users/2 to b: write rejected',
      },
    ]);
    expect(failed).toHaveBeenCalledWith({
      resourceType: 'users',
      key: '2',
      target: SIDE.B,
      error: 'Failed to apply users/2 to b: write rejected',
    });
  });

  it('should only log planned writes on a dry run', async () => {
    const storeA = memoryStore('a', ['users'], { users: { '1': { age: 30 } } });
    const storeB = memoryStore('b', ['users'], { users: { '1': { age: 31 }, '2': { name: 'x' } } });
    const applyA = vi.spyOn(storeA, 'apply');
    const applyB = vi.spyOn(storeB, 'apply');
    const { report, engine } = setup({ storeA, storeB, dryRun: true });

    await resolveUsers(engine, storeA, storeB);

    expect(applyA).not.toHaveBeenCalled();
    expect(applyB).not.toHaveBeenCalled();
    expect(storeB.get('users', '1')).toEqual({ age: 31 });

    const built = report.build();
    expect(built.resources[0]).toMatchObject({ updated: 0, created: 0, skipped: 2, errors: 0 });
    expect(built.log.map(entry => entry.message)).toEqual([
      'Would update users/1 in B (A wins)',
      'Would create users/2 in A',
    ]);
  });

  it('should count skip decisions as skipped', async () => {
    const storeA = memoryStore('a', ['users'], { users: { '1': { age: 30 } } });
    const storeB = memoryStore('b', ['users'], { users: { '1': { age: 31 } } });
    const { report, engine } = setup({ storeA, storeB, resolver: new CustomConflictResolver(() => 'skip') });

    await resolveUsers(engine, storeA, storeB);

    expect(storeA.get('users', '1')).toEqual({ age: 30 });
    expect(storeB.get('users', '1')).toEqual({ age: 31 });
    expect(report.build().resources[0]).toMatchObject({ updated: 0, skipped: 1 });
  });

  it('should record a resolver failure against its key', async () => {
    const storeA = memoryStore('a', ['users'], { users: { '1': { age: 30 } } });
    const storeB = memoryStore('b', ['users'], { users: { '1': { age: 31 } } });
    const resolver = new CustomConflictResolver(() => {
      throw new Error('no rule for users');
    });
    const { report, engine } = setup({ storeA, storeB, resolver });

    await resolveUsers(engine, storeA, storeB);

    expect(report.build().errors).toEqual([
      {
        resourceType: 'users',
        key: '1',
        code: 'APPLY_FAILED',
        message: 'Resolver failed for users/1: no rule for users',
      },
    ]);
  });
});
