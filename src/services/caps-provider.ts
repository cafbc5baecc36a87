/**
 * Caps Provider: effective [min, max] per dimension from layered proposals.
 *
 * Subsystems propose caps per layer (`SubsystemOutput.caps[layer][dimension]`).
 * Resolution happens in two steps:
 *
 * 1. Within a layer, proposals merge by the layer's mode:
 *    - HardMax           → intersection (every proposal must hold)
 *    - Additive/Baseline → union (proposals widen the range)
 *    - SoftMax           → last writer wins, writes applied in ascending
 *                          subsystem priority (highest priority stands; equal
 *                          priorities → later registration stands)
 * 2. Across layers, in configured order, by the across-layer policy:
 *    - strict  → intersection of every layer; an empty result is a per-dimension
 *                ProcessingError, not a failure of the whole resolution
 *    - lenient → only the highest-priority layer is authoritative; the others
 *                are ignored, and a dimension it does not cap stays uncapped
 *    - custom  → the configured merge function decides
 *
 * The arithmetic is synchronous. Only getCapsForDimension suspends, because it
 * has to gather subsystem outputs first.
 */
import { ProcessingError, ValidationError } from '../errors.js';
import type {
  Actor,
  CapLayer,
  CapLayerConfig,
  CustomCapMerge,
  LayerCaps,
  OrderedOutput,
} from '../types/stats.js';
import { Caps } from './caps.js';
import { orderCapLayers } from './cap-layer-config.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CapsComputationOptions {
  /**
   * Dimensions carrying at least one penalty-tolerant contribution. SoftMax
   * layers with softCapPolicy 'allow-penalty-tolerant' leave their max open
   * for these.
   */
  penaltyTolerantDimensions?: ReadonlySet<string>;
}

export interface EffectiveCaps {
  /** Dimensions with a usable cap. */
  readonly caps: Map<string, Caps>;
  /** Dimensions whose layers could not be reconciled. */
  readonly conflicts: Map<string, ProcessingError>;
}

/** Supplies the ordered subsystem outputs for an actor. */
export type OutputSource = (actor: Actor) => Promise<readonly OrderedOutput[]>;

export interface CapStatistics {
  readonly totalCalculations: number;
  readonly conflicts: number;
  readonly invalidProposals: number;
  readonly dimensionsWithCaps: number;
}

export interface CapsProviderOptions {
  outputSource?: OutputSource;
  log?: (level: 'warn' | 'info', data: Record<string, unknown>) => void;
}

// ---------------------------------------------------------------------------
// Ready-made custom merges
// ---------------------------------------------------------------------------

/** Widest range across layers. */
export const unionAcrossLayers: CustomCapMerge = (_dimension, perLayer) =>
  perLayer.reduce<Caps | null>((acc, { caps }) => (acc ? acc.union(caps) : caps), null);

/** Each layer replaces the previous one; the last layer in processing order wins. */
export const prioritizedOverrideAcrossLayers: CustomCapMerge = (_dimension, perLayer) =>
  perLayer.length > 0 ? perLayer[perLayer.length - 1].caps : null;

/** Dimensions that received at least one penalty-tolerant contribution. */
export function penaltyTolerantDimensions(outputs: readonly OrderedOutput[]): Set<string> {
  const dimensions = new Set<string>();
  for (const { output } of outputs) {
    for (const list of Object.values(output.contributions)) {
      for (const contribution of list) {
        if (contribution.penaltyTolerant) dimensions.add(contribution.dimension);
      }
    }
  }
  return dimensions;
}

// ---------------------------------------------------------------------------
// CapsProvider
// ---------------------------------------------------------------------------

export class CapsProvider {
  private readonly orderedLayers: readonly CapLayer[];
  private readonly layersByName: ReadonlyMap<string, CapLayer>;
  /** Highest priority; ties go to the earlier layer in processing order. */
  private readonly topLayer: CapLayer | undefined;
  private outputSource: OutputSource | undefined;
  private readonly log: CapsProviderOptions['log'];

  private _totalCalculations = 0;
  private _conflicts = 0;
  private _invalidProposals = 0;
  private _dimensionsWithCaps = 0;

  constructor(
    readonly config: CapLayerConfig,
    options: CapsProviderOptions = {},
  ) {
    this.orderedLayers = orderCapLayers(config);
    this.layersByName = new Map(config.layers.map((layer) => [layer.name, layer]));
    this.topLayer = this.orderedLayers.reduce<CapLayer | undefined>(
      (top, layer) => (top === undefined || layer.priority > top.priority ? layer : top),
      undefined,
    );
    this.outputSource = options.outputSource;
    this.log = options.log;
  }

  /** Wire the output source after construction (the aggregator is built later). */
  bindOutputSource(source: OutputSource): void {
    this.outputSource = source;
  }

  /** Layer names in processing order. */
  getLayerOrder(): string[] {
    return this.orderedLayers.map((layer) => layer.name);
  }

  getLayers(): readonly CapLayer[] {
    return this.orderedLayers;
  }

  /**
   * Merge the caps proposed for one layer.
   * @throws ValidationError when the layer is not configured
   */
  effectiveCapsWithinLayer(
    actor: Actor,
    outputs: readonly OrderedOutput[],
    layerName: string,
    options: CapsComputationOptions = {},
  ): Map<string, Caps> {
    const layer = this.layersByName.get(layerName);
    if (!layer) {
      throw new ValidationError(`Unknown cap layer: ${layerName}`, { layer: layerName });
    }

    // SoftMax: ascending priority so the highest-priority write lands last.
    // Array sort is stable, so equal priorities keep registration order.
    const writers = layer.mode === 'SoftMax'
      ? [...outputs].sort((a, b) => a.priority - b.priority || a.sequence - b.sequence)
      : outputs;

    const merged = new Map<string, Caps>();
    for (const { systemId, output } of writers) {
      const proposals = output.caps?.[layerName];
      if (!proposals) continue;

      for (const dimension of Object.keys(proposals).sort()) {
        const proposed = Caps.from(proposals[dimension]);
        if (!proposed.isValid()) {
          this._invalidProposals++;
          this.log?.('warn', {
            event: 'stats_invalid_cap_proposal',
            actor_id: actor.id,
            system_id: systemId,
            layer: layerName,
            dimension,
            min: proposed.min,
            max: proposed.max,
          });
          continue;
        }

        const current = merged.get(dimension);
        merged.set(dimension, current ? mergeWithinLayer(layer, current, proposed) : proposed);
      }
    }

    if (layer.mode === 'SoftMax' && layer.softCapPolicy === 'allow-penalty-tolerant') {
      for (const dimension of options.penaltyTolerantDimensions ?? []) {
        const caps = merged.get(dimension);
        if (caps) merged.set(dimension, new Caps(caps.min, Number.POSITIVE_INFINITY));
      }
    }

    return merged;
  }

  /**
   * Combine every configured layer under the across-layer policy.
   * Conflicts are collected per dimension; the call itself does not throw.
   */
  effectiveCapsAcrossLayers(
    actor: Actor,
    outputs: readonly OrderedOutput[],
    options: CapsComputationOptions = {},
  ): EffectiveCaps {
    this._totalCalculations++;

    // dimension → per-layer caps in processing order
    const perDimension = new Map<string, LayerCaps[]>();
    for (const layer of this.orderedLayers) {
      const layerCaps = this.effectiveCapsWithinLayer(actor, outputs, layer.name, options);
      for (const [dimension, caps] of layerCaps) {
        const list = perDimension.get(dimension);
        if (list) {
          list.push({ layer, caps });
        } else {
          perDimension.set(dimension, [{ layer, caps }]);
        }
      }
    }

    const caps = new Map<string, Caps>();
    const conflicts = new Map<string, ProcessingError>();

    for (const dimension of [...perDimension.keys()].sort()) {
      const perLayer = perDimension.get(dimension) ?? [];
      const combined = this.combineAcrossLayers(dimension, perLayer);
      if (combined === null) continue;

      if (!combined.isValid()) {
        const error = new ProcessingError(
          `Cap layers conflict for dimension ${dimension}: min ${combined.min} > max ${combined.max}`,
          { dimension, layers: perLayer.map(({ layer }) => layer.name), policy: this.config.policy },
        );
        conflicts.set(dimension, error);
        this._conflicts++;
        this.log?.('warn', {
          event: 'stats_cap_conflict',
          actor_id: actor.id,
          dimension,
          policy: this.config.policy,
          layers: perLayer.map(({ layer }) => layer.name),
        });
        continue;
      }
      caps.set(dimension, combined);
    }

    this._dimensionsWithCaps = caps.size;
    return { caps, conflicts };
  }

  /**
   * Effective caps for one dimension, gathering outputs through the bound
   * output source. Null when the dimension is uncapped or its layers conflict.
   * @throws ValidationError when no output source is bound
   */
  async getCapsForDimension(dimension: string, actor: Actor): Promise<Caps | null> {
    if (!this.outputSource) {
      throw new ValidationError('CapsProvider has no output source bound', { dimension });
    }
    const outputs = await this.outputSource(actor);
    const { caps } = this.effectiveCapsAcrossLayers(actor, outputs, {
      penaltyTolerantDimensions: penaltyTolerantDimensions(outputs),
    });
    return caps.get(dimension) ?? null;
  }

  /**
   * @throws ValidationError when the caps are invalid (min > max or NaN)
   */
  validateCaps(dimension: string, caps: Caps): void {
    if (!caps.isValid()) {
      throw new ValidationError(
        `Invalid caps for dimension ${dimension}: min=${caps.min}, max=${caps.max}`,
        { dimension, min: caps.min, max: caps.max },
      );
    }
  }

  getStatistics(): CapStatistics {
    return {
      totalCalculations: this._totalCalculations,
      conflicts: this._conflicts,
      invalidProposals: this._invalidProposals,
      dimensionsWithCaps: this._dimensionsWithCaps,
    };
  }

  private combineAcrossLayers(dimension: string, perLayer: readonly LayerCaps[]): Caps | null {
    if (perLayer.length === 0) return null;

    switch (this.config.policy) {
      case 'strict':
        return perLayer.reduce((acc, { caps }) => acc.intersection(caps), Caps.unbounded());
      case 'lenient':
        return perLayer.find(({ layer }) => layer.name === this.topLayer?.name)?.caps ?? null;
      case 'custom': {
        const merge = this.config.customMerge;
        if (!merge) {
          throw new ValidationError('custom cap policy configured without customMerge');
        }
        const result = merge(dimension, perLayer);
        return result ? Caps.from(result) : null;
      }
    }
  }
}

function mergeWithinLayer(layer: CapLayer, current: Caps, proposed: Caps): Caps {
  switch (layer.mode) {
    case 'HardMax':
      return current.intersection(proposed);
    case 'Additive':
    case 'Baseline':
      return current.union(proposed);
    case 'SoftMax':
      return proposed;
  }
}
