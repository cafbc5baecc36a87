import { Hono } from 'hono';
import { z } from 'zod';
import type { Aggregator } from '../services/aggregator.js';
import type { CapsProvider } from '../services/caps-provider.js';
import { toWireSnapshot } from '../services/snapshot-codec.js';
import { handleRouteError } from '../utils/error-handler.js';
import { ACTOR_ID_MAX_LENGTH, isValidActorId } from '../validation.js';

// ─── Request Schemas ──────────────────────────────────────────

const ResolveRequestSchema = z.object({
  actor: z.object({
    id: z.string().min(1).max(ACTOR_ID_MAX_LENGTH),
    version: z.number().int().nonnegative(),
    subsystems: z.array(z.string().min(1)).max(256).optional(),
  }),
  context: z
    .object({
      initialValues: z.record(z.number().finite()).optional(),
      conditions: z.record(z.boolean()).optional(),
      data: z.record(z.unknown()).optional(),
    })
    .optional(),
});

// ─── Dependencies ─────────────────────────────────────────────

export interface StatsRouteDeps {
  aggregator: Aggregator;
  capsProvider: CapsProvider;
}

/**
 * Stats routes.
 *
 * Endpoints:
 * - GET    /metrics                 aggregator counters
 * - GET    /caps/layers             cap layers in processing order, and the policy
 * - POST   /resolve                 resolve `{ actor, context? }` to a snapshot
 * - DELETE /cache/actors/:actorId   drop every stored snapshot of one actor
 * - DELETE /cache                   drop every stored snapshot
 *
 * Snapshots are rendered through the wire codec: infinite caps appear as
 * "Infinity" / "-Infinity".
 */
export function createStatsRoutes(deps: StatsRouteDeps): Hono {
  const { aggregator, capsProvider } = deps;
  const app = new Hono();

  app.get('/metrics', (c) => c.json(aggregator.getMetrics()));

  app.get('/caps/layers', (c) =>
    c.json({
      policy: capsProvider.config.policy,
      order: capsProvider.config.order,
      layers: capsProvider.getLayers().map((layer) => ({
        name: layer.name,
        priority: layer.priority,
        mode: layer.mode,
        softCapPolicy: layer.softCapPolicy ?? 'enforce',
      })),
    }),
  );

  app.post('/resolve', async (c) => {
    const raw = await c.req.json().catch(() => null);
    const parsed = ResolveRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return c.json(
        {
          error: 'invalid_request',
          message: issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'Invalid request body',
        },
        400,
      );
    }

    try {
      const snapshot = await aggregator.resolveWithContext(parsed.data.actor, parsed.data.context ?? {});
      return c.json(toWireSnapshot(snapshot));
    } catch (err) {
      return handleRouteError(c, err, 'Resolution failed');
    }
  });

  app.delete('/cache/actors/:actorId', async (c) => {
    const actorId = c.req.param('actorId');
    if (!isValidActorId(actorId)) {
      return c.json({ error: 'invalid_request', message: 'Invalid actorId format' }, 400);
    }
    try {
      const removed = await aggregator.invalidateActor(actorId);
      return c.json({ actorId, removed });
    } catch (err) {
      return handleRouteError(c, err);
    }
  });

  app.delete('/cache', async (c) => {
    try {
      const removed = await aggregator.clearCache();
      return c.json({ removed });
    } catch (err) {
      return handleRouteError(c, err);
    }
  });

  return app;
}
