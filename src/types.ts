/**
 * HTTP-facing types for the stats service surface.
 *
 * Domain types live in types/stats.ts.
 */

/** Health status for an individual component */
export interface ComponentHealth {
  status: 'healthy' | 'degraded' | 'unreachable';
  latency_ms?: number;
  error?: string;
}

/** Aggregated health response */
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime_seconds: number;
  components: {
    aggregator: ComponentHealth;
    registry: ComponentHealth & { subsystems: number; violations: string[] };
    snapshot_store: ComponentHealth & { backend: 'memory' | 'redis' };
  };
  timestamp: string;
}

/** Error response shape */
export interface ErrorResponse {
  error: string;
  message: string;
  request_id?: string;
}
