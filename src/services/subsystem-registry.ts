import { RegistryError } from '../errors.js';
import type { Actor, ResolutionContext, SubsystemOutput } from '../types/stats.js';

/**
 * Subsystem Registry: the ordered set of contributors the aggregator fans out to.
 *
 * Ordering: priority DESC, ties broken by registration sequence (earlier first).
 * The order is recomputed on every mutation and published as a fresh frozen
 * array, so a resolution that already holds the array never observes a
 * registration that happens mid-flight.
 */

/** A source of contributions and cap proposals. */
export interface Subsystem {
  /** Unique across the registry. */
  readonly systemId: string;
  /** Higher priority merges first. */
  readonly priority: number;
  contribute(actor: Actor, context: ResolutionContext): Promise<SubsystemOutput>;
  /** Skip this subsystem for an actor. Default: contribute. */
  shouldContribute?(actor: Actor): boolean;
}

/** A registered subsystem with its registration sequence. */
export interface RegisteredSubsystem {
  readonly subsystem: Subsystem;
  readonly sequence: number;
}

export interface SubsystemRegistryOptions {
  log?: (level: 'info' | 'warn', data: Record<string, unknown>) => void;
}

export class SubsystemRegistry {
  private readonly byId = new Map<string, RegisteredSubsystem>();
  private ordered: readonly RegisteredSubsystem[] = Object.freeze([]);
  private nextSequence = 0;

  constructor(private readonly options: SubsystemRegistryOptions = {}) {}

  /**
   * Register a subsystem. Each systemId may only be registered once.
   * @throws RegistryError on an empty or duplicate systemId, or a non-finite priority
   */
  register(subsystem: Subsystem): void {
    if (subsystem.systemId.length === 0) {
      throw new RegistryError('Subsystem id cannot be empty');
    }
    if (!Number.isFinite(subsystem.priority)) {
      throw new RegistryError(`Subsystem priority must be finite: ${subsystem.systemId}`, {
        systemId: subsystem.systemId,
      });
    }
    if (this.byId.has(subsystem.systemId)) {
      throw new RegistryError(`Subsystem already registered: ${subsystem.systemId}`, {
        systemId: subsystem.systemId,
      });
    }
    this.byId.set(subsystem.systemId, { subsystem, sequence: this.nextSequence++ });
    this.publish();
    this.options.log?.('info', {
      event: 'stats_subsystem_registered',
      system_id: subsystem.systemId,
      priority: subsystem.priority,
    });
  }

  /**
   * Remove a subsystem.
   * @throws RegistryError when the id is not registered
   */
  unregister(systemId: string): void {
    if (!this.byId.delete(systemId)) {
      throw new RegistryError(`Subsystem not registered: ${systemId}`, { systemId });
    }
    this.publish();
    this.options.log?.('info', { event: 'stats_subsystem_unregistered', system_id: systemId });
  }

  getById(systemId: string): Subsystem | undefined {
    return this.byId.get(systemId)?.subsystem;
  }

  isRegistered(systemId: string): boolean {
    return this.byId.has(systemId);
  }

  /** Current ordering. The returned array is frozen and never mutated afterwards. */
  entries(): readonly RegisteredSubsystem[] {
    return this.ordered;
  }

  /** Subsystems in merge order. */
  getByPriority(): Subsystem[] {
    return this.ordered.map((entry) => entry.subsystem);
  }

  /** Subsystems with min ≤ priority ≤ max, in merge order. */
  getByPriorityRange(min: number, max: number): Subsystem[] {
    return this.ordered
      .filter(({ subsystem }) => subsystem.priority >= min && subsystem.priority <= max)
      .map((entry) => entry.subsystem);
  }

  /** Registered ids in merge order. */
  listIds(): string[] {
    return this.ordered.map((entry) => entry.subsystem.systemId);
  }

  count(): number {
    return this.byId.size;
  }

  /**
   * Check every registered subsystem for structural problems.
   * @returns One message per violation; empty when the registry is sound.
   */
  validateAll(): string[] {
    const violations: string[] = [];
    for (const { subsystem } of this.ordered) {
      if (subsystem.systemId.trim().length === 0) {
        violations.push('subsystem with blank systemId');
      }
      if (!Number.isInteger(subsystem.priority)) {
        violations.push(`${subsystem.systemId}: priority is not an integer`);
      }
      if (typeof subsystem.contribute !== 'function') {
        violations.push(`${subsystem.systemId}: contribute is not a function`);
      }
    }
    return violations;
  }

  /** @throws RegistryError listing every violation */
  assertValid(): void {
    const violations = this.validateAll();
    if (violations.length > 0) {
      throw new RegistryError(`Subsystem registry invalid: ${violations.join('; ')}`, { violations });
    }
  }

  /** Reset for testing. */
  clear(): void {
    this.byId.clear();
    this.ordered = Object.freeze([]);
    this.nextSequence = 0;
  }

  private publish(): void {
    this.ordered = Object.freeze(
      [...this.byId.values()].sort(
        (a, b) => b.subsystem.priority - a.subsystem.priority || a.sequence - b.sequence,
      ),
    );
  }
}
