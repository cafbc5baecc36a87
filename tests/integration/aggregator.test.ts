import { describe, it, expect, vi } from 'vitest';
import { createStatEngine, type StatEngineOptions } from '../../src/engine.js';
import { loadConfig } from '../../src/config.js';
import { Caps } from '../../src/services/caps.js';
import { createContribution as c } from '../../src/services/contribution.js';
import { MemorySnapshotStore } from '../../src/services/memory-snapshot-store.js';
import { CacheError, ProcessingError, ValidationError } from '../../src/errors.js';
import type { Subsystem } from '../../src/services/subsystem-registry.js';
import { actor, fakeSubsystem } from '../fixtures/subsystems.js';

function engine(subsystems: Subsystem[], options: Omit<StatEngineOptions, 'subsystems'> = {}) {
  return createStatEngine({
    config: loadConfig({ STATS_SUBSYSTEM_TIMEOUT_MS: '50' }),
    log: vi.fn(),
    subsystems,
    ...options,
  });
}

const equipment = () => fakeSubsystem('equipment', 100, { contributions: [c('strength', 'Flat', 10, 'equipment')] });
const buffs = () => fakeSubsystem('buffs', 50, { contributions: [c('strength', 'Mult', 1.2, 'buff')] });
const talents = () => fakeSubsystem('talents', 10, { contributions: [c('strength', 'PostAdd', 5, 'talent')] });

describe('Aggregator resolution', () => {
  it('folds Flat, Mult and PostAdd from three subsystems', async () => {
    const { aggregator } = engine([talents(), buffs(), equipment()]);

    const snapshot = await aggregator.resolveWithContext(actor(), { initialValues: { strength: 100 } });

    expect(snapshot.primary).toEqual({ strength: 137 });
    expect(snapshot.derived).toEqual({});
    expect(snapshot.capsUsed).toEqual({});
    expect(snapshot.subsystemsProcessed).toEqual(['equipment', 'buffs', 'talents']);
    expect(snapshot.diagnostics).toEqual([]);
    expect(snapshot.actorId).toBe('player-1');
    expect(snapshot.version).toBe(1);
  });

  it('a later Override replaces the arithmetic', async () => {
    const special = fakeSubsystem('special', 1, { contributions: [c('strength', 'Override', 150, 'special')] });
    const { aggregator } = engine([equipment(), buffs(), talents(), special]);

    const snapshot = await aggregator.resolveWithContext(actor(), { initialValues: { strength: 100 } });
    expect(snapshot.primary.strength).toBe(150);
  });

  it('clamps to the strict intersection of cap layers', async () => {
    const limits = fakeSubsystem('limits', 1, {
      caps: { realm: { strength: new Caps(0, 200) }, world: { strength: new Caps(0, 100) } },
    });
    const { aggregator } = engine([equipment(), buffs(), talents(), limits]);

    const snapshot = await aggregator.resolveWithContext(actor(), { initialValues: { strength: 100 } });
    expect(snapshot.primary.strength).toBe(100);
    expect(snapshot.capsUsed).toEqual({ strength: { min: 0, max: 100 } });
  });

  it('merges in registry order whatever the completion order', async () => {
    for (const [slowDelay, fastDelay] of [[30, 0], [0, 30]]) {
      const first = fakeSubsystem('first', 100, {
        contributions: [c('hp', 'Override', 50, 'first')],
        delayMs: slowDelay,
      });
      const second = fakeSubsystem('second', 10, {
        contributions: [c('hp', 'Override', 70, 'second')],
        delayMs: fastDelay,
      });
      const { aggregator } = engine([second, first]);

      const snapshot = await aggregator.resolve(actor());
      expect(snapshot.derived.hp).toBe(70);
      expect(snapshot.subsystemsProcessed).toEqual(['first', 'second']);
    }
  });

  it('classifies dimensions as primary or derived', async () => {
    const items = fakeSubsystem('items', 1, {
      contributions: [c('strength', 'Flat', 3, 'a'), c('crit_chance', 'Flat', 0.25, 'b')],
    });
    const { aggregator } = engine([items]);

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.primary).toEqual({ strength: 3 });
    expect(snapshot.derived).toEqual({ crit_chance: 0.25 });
  });

  it('lets penalty-tolerant contributions exceed a tolerant SoftMax layer', async () => {
    const limits = fakeSubsystem('limits', 1, { caps: { guild: { hp: new Caps(0, 50), mp: new Caps(0, 50) } } });
    const gear = fakeSubsystem('gear', 2, {
      contributions: [c('hp', 'Flat', 80, 'cursed-ring', { penaltyTolerant: true }), c('mp', 'Flat', 80, 'staff')],
    });
    const { aggregator } = engine([limits, gear]);

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.derived).toEqual({ hp: 80, mp: 50 });
    expect(snapshot.capsUsed.hp).toEqual({ min: 0, max: Number.POSITIVE_INFINITY });
  });

  it('reports a cap conflict and leaves the value unclamped', async () => {
    const limits = fakeSubsystem('limits', 1, {
      caps: { realm: { hp: new Caps(0, 10) }, total: { hp: new Caps(20, 30) } },
      contributions: [c('hp', 'Flat', 15, 'base')],
    });
    const { aggregator } = engine([limits]);

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.derived.hp).toBe(15);
    expect(snapshot.capsUsed).toEqual({});
    expect(snapshot.diagnostics).toEqual([
      {
        type: 'CAP_CONFLICT',
        dimension: 'hp',
        message: 'Cap layers conflict for dimension hp: min 20 > max 10',
        unclamped: true,
      },
    ]);
    expect(aggregator.getMetrics().capConflicts).toBe(1);
  });

  it('reports invalid contributions without failing the dimension', async () => {
    const items = fakeSubsystem('items', 1, {
      contributions: [c('strength', 'Flat', 5, 'ok'), c('strength', 'Flat', Number.NaN, 'broken')],
    });
    const { aggregator } = engine([items]);

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.primary.strength).toBe(5);
    expect(snapshot.diagnostics).toEqual([
      { type: 'INVALID_CONTRIBUTION', dimension: 'strength', source: 'broken', reason: 'non-finite value: NaN' },
    ]);
  });

  it('applies Conditional contributions when extended buckets are on', async () => {
    const night = fakeSubsystem('night', 1, {
      contributions: [c('agility', 'Conditional', 4, 'night-bonus', { condition: 'night' })],
    });
    const { aggregator } = engine([night], {
      config: loadConfig({ STATS_EXTENDED_BUCKETS: 'true' }),
    });

    const day = await aggregator.resolveWithContext(actor(), { conditions: { night: false } });
    const dark = await aggregator.resolveWithContext(actor(), { conditions: { night: true } });
    expect(day.primary.agility).toBe(0);
    expect(dark.primary.agility).toBe(4);
  });

  it('returns a deeply frozen snapshot', async () => {
    const { aggregator } = engine([equipment()]);
    const snapshot = await aggregator.resolve(actor());
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.primary)).toBe(true);
    expect(Object.isFrozen(snapshot.diagnostics)).toBe(true);
  });

  it('only runs the subsystems the actor carries', async () => {
    const eq = equipment();
    const bf = buffs();
    const { aggregator } = engine([eq, bf]);

    const snapshot = await aggregator.resolve(actor('player-1', 1, ['buffs']));
    expect(snapshot.subsystemsProcessed).toEqual(['buffs']);
    expect(eq.calls).toBe(0);
  });

  it('honours shouldContribute', async () => {
    const npcOnly = fakeSubsystem('npc', 1, {
      contributions: [c('luck', 'Flat', 1, 'npc')],
      shouldContribute: (a) => a.id.startsWith('npc-'),
    });
    const { aggregator } = engine([equipment(), npcOnly]);

    expect((await aggregator.resolve(actor('player-1'))).subsystemsProcessed).toEqual(['equipment']);
    expect((await aggregator.resolve(actor('npc-1'))).subsystemsProcessed).toEqual(['equipment', 'npc']);
  });

  it('does not see a subsystem registered during the resolution', async () => {
    const late = fakeSubsystem('late', 1000, { contributions: [c('luck', 'Flat', 1, 'late')] });
    const { aggregator, registry } = engine([]);
    registry.register({
      systemId: 'registrar',
      priority: 1,
      async contribute() {
        if (!registry.isRegistered('late')) registry.register(late);
        return { systemId: 'registrar', contributions: { luck: [c('luck', 'Flat', 2, 'registrar')] } };
      },
    });

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.subsystemsProcessed).toEqual(['registrar']);
    expect(snapshot.primary.luck).toBe(2);
    expect(late.calls).toBe(0);
  });

  it('treats dimension names that shadow Object.prototype as plain stats', async () => {
    const odd = fakeSubsystem('odd', 1, {
      contributions: [c('constructor', 'Flat', 10, 'odd'), c('__proto__', 'Flat', 5, 'odd')],
    });
    const { aggregator } = engine([odd]);

    const snapshot = await aggregator.resolveWithContext(actor(), { initialValues: { hp: 1 } });
    expect(Object.keys(snapshot.derived)).toEqual(['__proto__', 'constructor']);
    expect(Object.getOwnPropertyDescriptor(snapshot.derived, 'constructor')?.value).toBe(10);
    expect(Object.getOwnPropertyDescriptor(snapshot.derived, '__proto__')?.value).toBe(5);
    expect(Object.getPrototypeOf(snapshot.derived)).toBe(Object.prototype);
  });

  it('rejects a malformed actor', async () => {
    const { aggregator } = engine([equipment()]);
    await expect(aggregator.resolve(actor('player-1', -1))).rejects.toThrow(
      new ValidationError('Actor version must be a non-negative integer (got -1)'),
    );
    await expect(aggregator.resolve(actor('', 1))).rejects.toThrow('Actor id cannot be empty');
  });

  it('rejects non-finite initial values', async () => {
    const { aggregator } = engine([equipment()]);
    await expect(
      aggregator.resolveWithContext(actor(), { initialValues: { strength: Number.POSITIVE_INFINITY } }),
    ).rejects.toThrow('Initial value for strength must be finite (got Infinity)');
  });

  it('resolveBatch keeps input order', async () => {
    const { aggregator } = engine([equipment()]);
    const snapshots = await aggregator.resolveBatch([actor('a'), actor('b'), actor('c')]);
    expect(snapshots.map((s) => s.actorId)).toEqual(['a', 'b', 'c']);
  });
});

describe('Aggregator failures', () => {
  it('skips a failing subsystem and reports it', async () => {
    const broken = fakeSubsystem('broken', 5, { error: new Error('inventory offline') });
    const { aggregator } = engine([equipment(), broken]);

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.primary.strength).toBe(10);
    expect(snapshot.subsystemsProcessed).toEqual(['equipment']);
    expect(snapshot.diagnostics).toEqual([
      { type: 'SUBSYSTEM_FAILURE', systemId: 'broken', message: 'inventory offline' },
    ]);
    expect(aggregator.getMetrics().subsystems.broken).toMatchObject({ failures: 1, timeouts: 0 });
  });

  it('times out a slow subsystem', async () => {
    const slow = fakeSubsystem('slow', 5, { contributions: [c('strength', 'Flat', 99, 'slow')], delayMs: 300 });
    const { aggregator } = engine([equipment(), slow]);

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.primary.strength).toBe(10);
    expect(snapshot.diagnostics).toEqual([{ type: 'SUBSYSTEM_TIMEOUT', systemId: 'slow', timeoutMs: 50 }]);
    expect(aggregator.getMetrics().subsystems.slow).toMatchObject({ failures: 1, timeouts: 1 });
  });

  it('treats a malformed output as a failure', async () => {
    const { aggregator } = engine([
      equipment(),
      { systemId: 'untyped', priority: 1, contribute: async () => JSON.parse('{"systemId":"untyped"}') },
    ]);

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.diagnostics).toEqual([
      {
        type: 'SUBSYSTEM_FAILURE',
        systemId: 'untyped',
        message: 'Subsystem untyped returned a malformed output: contributions: Required',
      },
    ]);
  });

  it('skips a subsystem whose contribution list holds a malformed element', async () => {
    const good = fakeSubsystem('good', 2, { contributions: [c('hp', 'Flat', 10, 'base')] });
    const { aggregator } = engine([
      good,
      { systemId: 'bad', priority: 1, contribute: async () => JSON.parse('{"contributions":{"hp":[null]}}') },
    ]);

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.derived).toEqual({ hp: 10 });
    expect(snapshot.subsystemsProcessed).toEqual(['good']);
    expect(snapshot.diagnostics).toEqual([
      {
        type: 'SUBSYSTEM_FAILURE',
        systemId: 'bad',
        message: 'Subsystem bad returned a malformed output: contributions.hp.0: Expected object, received null',
      },
    ]);
  });

  it('skips a subsystem proposing a malformed cap', async () => {
    const good = fakeSubsystem('good', 2, { contributions: [c('hp', 'Flat', 10, 'base')] });
    const { aggregator } = engine([
      good,
      {
        systemId: 'bad',
        priority: 1,
        contribute: async () => JSON.parse('{"contributions":{},"caps":{"world":{"hp":null}}}'),
      },
    ]);

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.derived).toEqual({ hp: 10 });
    expect(snapshot.capsUsed).toEqual({});
    expect(snapshot.diagnostics).toEqual([
      {
        type: 'SUBSYSTEM_FAILURE',
        systemId: 'bad',
        message: 'Subsystem bad returned a malformed output: caps.world.hp: Expected object, received null',
      },
    ]);
  });

  it('fails the resolution when every subsystem fails', async () => {
    const log = vi.fn();
    const { aggregator } = engine(
      [
        fakeSubsystem('a', 2, { error: new Error('down') }),
        fakeSubsystem('b', 1, { error: new Error('down') }),
      ],
      { log },
    );

    const err = await aggregator.resolve(actor()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProcessingError);
    expect(err).toMatchObject({ message: 'All 2 subsystems failed for actor player-1' });
    expect(aggregator.getMetrics().errorCount).toBe(1);
    expect(log).toHaveBeenCalledWith('error', {
      event: 'stats_resolution_failed',
      actor_id: 'player-1',
      version: 1,
      message: 'All 2 subsystems failed for actor player-1',
    });
  });

  it('resolves to an empty snapshot when no subsystem is eligible', async () => {
    const { aggregator } = engine([]);
    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.primary).toEqual({});
    expect(snapshot.subsystemsProcessed).toEqual([]);
  });
});

describe('Aggregator caching', () => {
  it('serves the second resolution from cache', async () => {
    const eq = equipment();
    const { aggregator } = engine([eq]);

    const first = await aggregator.resolve(actor());
    const second = await aggregator.resolve(actor());

    expect(second).toBe(first);
    expect(eq.calls).toBe(1);
    expect(aggregator.getMetrics()).toMatchObject({ totalResolutions: 2, cacheHits: 1, cacheMisses: 1 });
  });

  it('recomputes when the actor version changes', async () => {
    const eq = equipment();
    const { aggregator } = engine([eq]);

    await aggregator.resolve(actor('player-1', 1));
    const next = await aggregator.resolve(actor('player-1', 2));

    expect(next.version).toBe(2);
    expect(eq.calls).toBe(2);
    expect(await aggregator.getCachedSnapshot(actor('player-1', 1))).toBeNull();
    expect(await aggregator.getCachedSnapshot(actor('player-1', 2))).toBe(next);
  });

  it('computes once for concurrent resolutions of the same actor', async () => {
    const slowish = fakeSubsystem('items', 1, { contributions: [c('luck', 'Flat', 1, 'x')], delayMs: 10 });
    const { aggregator } = engine([slowish]);

    const snapshots = await Promise.all(Array.from({ length: 5 }, () => aggregator.resolve(actor())));

    expect(slowish.calls).toBe(1);
    expect(new Set(snapshots).size).toBe(1);
    expect(aggregator.getMetrics()).toMatchObject({ totalResolutions: 5, cacheMisses: 1, coalescedRequests: 4 });
  });

  it('keys the cache by context', async () => {
    const eq = equipment();
    const { aggregator } = engine([eq]);

    const base = await aggregator.resolveWithContext(actor(), { initialValues: { strength: 1 } });
    const boosted = await aggregator.resolveWithContext(actor(), { initialValues: { strength: 5 } });

    expect(base.primary.strength).toBe(11);
    expect(boosted.primary.strength).toBe(15);
    expect(eq.calls).toBe(2);
  });

  it('recomputes after the subsystem set changes', async () => {
    const { aggregator, registry } = engine([equipment()]);
    await aggregator.resolve(actor());
    registry.register(buffs());

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.subsystemsProcessed).toEqual(['equipment', 'buffs']);
    expect(snapshot.primary.strength).toBe(12);
  });

  it('invalidateActor forces a recomputation', async () => {
    const eq = equipment();
    const { aggregator } = engine([eq]);

    await aggregator.resolve(actor());
    expect(await aggregator.invalidateActor('player-1')).toBe(1);
    await aggregator.resolve(actor());
    expect(eq.calls).toBe(2);
  });

  it('computes directly when the store is unreachable', async () => {
    const store = new MemorySnapshotStore();
    vi.spyOn(store, 'get').mockRejectedValue(new CacheError('Redis get failed: ECONNREFUSED'));
    const { aggregator } = engine([equipment()], { store });

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.primary.strength).toBe(10);
    expect(snapshot.diagnostics).toEqual([
      { type: 'CACHE_UNAVAILABLE', message: 'Redis get failed: ECONNREFUSED' },
    ]);
    expect(aggregator.getMetrics().cacheErrors).toBe(1);
    expect(await aggregator.getCachedSnapshot(actor())).toBeNull();
    expect(aggregator.getMetrics().cacheErrors).toBe(2);
  });
});

describe('CapsProvider wired to the aggregator', () => {
  it('getCapsForDimension reads live subsystem outputs', async () => {
    const limits = fakeSubsystem('limits', 1, { caps: { world: { hp: new Caps(0, 500) } } });
    const { capsProvider } = engine([limits]);

    expect(await capsProvider.getCapsForDimension('hp', actor())).toEqual(new Caps(0, 500));
    expect(limits.calls).toBe(1);
  });

  it('getCapsForDimension reports the caps a resolution applies to penalty-tolerant stats', async () => {
    const limits = fakeSubsystem('limits', 1, { caps: { guild: { hp: new Caps(0, 100) } } });
    const gear = fakeSubsystem('gear', 2, {
      contributions: [c('hp', 'Flat', 150, 'cursed-ring', { penaltyTolerant: true })],
    });
    const { aggregator, capsProvider } = engine([limits, gear]);

    const snapshot = await aggregator.resolve(actor());
    expect(snapshot.capsUsed.hp).toEqual({ min: 0, max: Number.POSITIVE_INFINITY });
    expect(await capsProvider.getCapsForDimension('hp', actor())).toEqual(new Caps(0, Number.POSITIVE_INFINITY));
  });
});
