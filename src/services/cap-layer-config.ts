/**
 * Cap layer configuration: shape validation and ordering.
 *
 * The configuration arrives already loaded (from whatever file or store the
 * host uses); this module only checks its shape and freezes it. Layers are
 * immutable after startup.
 */
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { CapLayer, CapLayerConfig, CustomCapMerge } from '../types/stats.js';

// ─── Schemas ──────────────────────────────────────────────────

const CapLayerSchema = z.object({
  name: z.string().min(1).max(128),
  priority: z.number().int(),
  mode: z.enum(['Baseline', 'Additive', 'HardMax', 'SoftMax']),
  softCapPolicy: z.enum(['enforce', 'allow-penalty-tolerant']).optional(),
});

const CapLayerConfigSchema = z
  .object({
    layers: z.array(CapLayerSchema).min(1),
    policy: z.enum(['strict', 'lenient', 'custom']),
    order: z.enum(['priority-desc', 'priority-asc']).optional().default('priority-desc'),
    customMerge: z.custom<CustomCapMerge>((v) => typeof v === 'function', 'customMerge must be a function').optional(),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.layers.forEach((layer, i) => {
      if (seen.has(layer.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['layers', i, 'name'],
          message: `duplicate layer name: ${layer.name}`,
        });
      }
      seen.add(layer.name);
    });
    if (config.policy === 'custom' && !config.customMerge) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['customMerge'],
        message: 'custom policy requires a customMerge function',
      });
    }
  });

// ─── Parsing ──────────────────────────────────────────────────

/**
 * Validate an in-memory cap layer configuration.
 * @throws ValidationError listing every violated field
 */
export function parseCapLayerConfig(input: unknown): CapLayerConfig {
  const result = CapLayerConfigSchema.safeParse(input);
  if (!result.success) {
    const violations = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ValidationError(`Invalid cap layer configuration: ${violations.join('; ')}`, { violations });
  }

  const { layers, policy, order, customMerge } = result.data;
  return Object.freeze({
    layers: Object.freeze(layers.map((layer) => Object.freeze({ ...layer }))),
    policy,
    order,
    ...(customMerge ? { customMerge } : {}),
  });
}

/**
 * Layers in processing order. Equal priorities keep declaration order.
 * The first layer returned is the highest-precedence one.
 */
export function orderCapLayers(config: CapLayerConfig): CapLayer[] {
  const direction = config.order === 'priority-asc' ? 1 : -1;
  return [...config.layers].sort((a, b) => direction * (a.priority - b.priority));
}

/**
 * Five-layer default: realm → world → event → guild → total, intersected
 * strictly. Modes are a starting point; hosts are expected to supply their own.
 */
export function createDefaultCapLayerConfig(): CapLayerConfig {
  return parseCapLayerConfig({
    layers: [
      { name: 'realm', priority: 500, mode: 'Baseline' },
      { name: 'world', priority: 400, mode: 'HardMax' },
      { name: 'event', priority: 300, mode: 'Additive' },
      { name: 'guild', priority: 200, mode: 'SoftMax', softCapPolicy: 'allow-penalty-tolerant' },
      { name: 'total', priority: 100, mode: 'HardMax' },
    ],
    policy: 'strict',
    order: 'priority-desc',
  });
}
