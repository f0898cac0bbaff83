import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';

export type CacheState = 'HIT' | 'MISS';

const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'nbody_' });

const simulationRuns = new Counter({
  name: 'nbody_simulation_runs_total',
  help: 'Simulations served, by cache outcome',
  labelNames: ['cache'] as const,
  registers: [registry]
});

const simulationSteps = new Counter({
  name: 'nbody_simulation_steps_total',
  help: 'Integration steps actually computed',
  registers: [registry]
});

const simulationDuration = new Histogram({
  name: 'nbody_simulation_duration_seconds',
  help: 'Wall time of computed simulations',
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
  registers: [registry]
});

const httpRequests = new Counter({
  name: 'http_requests_total',
  help: 'HTTP requests handled',
  labelNames: ['method', 'route', 'status'] as const,
  registers: [registry]
});

export const metricsContentType = registry.contentType;

export function recordSimulationRun(cache: CacheState, steps: number, durationMs: number): void {
  simulationRuns.inc({ cache });
  if (cache === 'MISS') {
    simulationSteps.inc(steps);
    simulationDuration.observe(durationMs / 1000);
  }
}

export function recordHttpRequest(method: string, route: string, status: number): void {
  httpRequests.inc({ method, route, status: String(status) });
}

export function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
