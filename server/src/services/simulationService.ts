import { BODY_BY_ID, isBodyId } from '../config/bodies';
import {
  DEBUG_ASSERTIONS,
  RESULT_CACHE_MAX_ENTRIES,
  RESULT_CACHE_TTL_MS
} from '../config/simulation';
import { NBodySystem } from '../simulation/nbodySystem';
import { Body } from '../simulation/body';
import { logDebug, logInfo, logWarn } from '../observability/logger';
import { CacheState, recordSimulationRun } from '../observability/metrics';

export interface BodySnapshot {
  readonly name: string;
  readonly displayName: string;
  readonly mass: number;
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly vx: number;
  readonly vy: number;
  readonly vz: number;
}

export interface SimulationResult {
  steps: number;
  dt: number;
  initialEnergy: number;
  energy: number;
  energyDrift: number;
  // partagé avec le cache : gelé, en lecture seule
  bodies: readonly BodySnapshot[];
  metadata: {
    durationMs: number;
    cacheStatus: CacheState;
    cacheAgeMs: number;
    cacheExpiresInMs: number;
    generatedAt: string;
    requestId?: string;
  };
}

interface CacheEntry {
  result: SimulationResult;
  cachedAt: number;
  expiresAt: number;
}

// Map = ordre d'insertion, la première clé est la plus ancienne
const cache = new Map<string, CacheEntry>();

function cacheKey(steps: number, dt: number): string {
  return `${steps}:${dt}`;
}

function getFromCache(key: string, now: number): CacheEntry | null {
  const entry = cache.get(key);
  if (!entry) {
    return null;
  }
  if (now >= entry.expiresAt) {
    cache.delete(key);
    return null;
  }
  return entry;
}

function writeCache(key: string, entry: CacheEntry): void {
  cache.delete(key);
  cache.set(key, entry);
  while (cache.size > RESULT_CACHE_MAX_ENTRIES) {
    const oldest = cache.keys().next();
    if (oldest.done) {
      break;
    }
    cache.delete(oldest.value);
  }
}

export function clearSimulationCache(): void {
  cache.clear();
}

export function simulationCacheSize(): number {
  return cache.size;
}

export function toBodySnapshot(body: Body): BodySnapshot {
  const cfg = isBodyId(body.name) ? BODY_BY_ID.get(body.name) : undefined;
  return {
    name: body.name,
    displayName: cfg?.displayName ?? body.name,
    mass: body.mass,
    x: body.pos.x,
    y: body.pos.y,
    z: body.pos.z,
    vx: body.vel.x,
    vy: body.vel.y,
    vz: body.vel.z
  };
}

/** Rendu du benchmark : 9 décimales. */
export function formatEnergy(value: number): string {
  return value.toFixed(9);
}

export function getInitialConditions(): BodySnapshot[] {
  return NBodySystem.create().bodies.map(toBodySnapshot);
}

export function simulate(steps: number, dt: number): NBodySystem {
  let system = NBodySystem.create();
  for (let i = 0; i < steps; i++) {
    system = system.advance(dt);
  }
  return system;
}

function computeFresh(steps: number, dt: number): SimulationResult {
  const started = Date.now();
  const initial = NBodySystem.create();
  const initialEnergy = initial.energy();
  const final = simulate(steps, dt);
  const energy = final.energy();
  const durationMs = Date.now() - started;

  if (DEBUG_ASSERTIONS && !Number.isFinite(energy)) {
    logWarn('simulation_non_finite_energy', { steps, dt, energy: String(energy) });
  }

  return {
    steps,
    dt,
    initialEnergy,
    energy,
    energyDrift: energy - initialEnergy,
    bodies: Object.freeze(final.bodies.map((body) => Object.freeze(toBodySnapshot(body)))),
    metadata: {
      durationMs,
      cacheStatus: 'MISS',
      cacheAgeMs: 0,
      cacheExpiresInMs: RESULT_CACHE_TTL_MS,
      generatedAt: new Date(started).toISOString()
    }
  };
}

export function runSimulation(options: {
  steps: number;
  dt: number;
  forceRefresh?: boolean;
  requestId?: string;
}): SimulationResult {
  const { steps, dt, requestId } = options;
  const key = cacheKey(steps, dt);
  const now = Date.now();

  if (!options.forceRefresh) {
    const cached = getFromCache(key, now);
    if (cached) {
      const cacheAgeMs = now - cached.cachedAt;
      recordSimulationRun('HIT', steps, 0);
      logDebug('simulation_cache_hit', { steps, dt, cacheAgeMs, requestId });
      return {
        ...cached.result,
        metadata: {
          ...cached.result.metadata,
          cacheStatus: 'HIT',
          cacheAgeMs,
          cacheExpiresInMs: Math.max(0, cached.expiresAt - now),
          requestId
        }
      };
    }
  }

  const result = computeFresh(steps, dt);
  if (RESULT_CACHE_TTL_MS > 0) {
    const cachedAt = Date.now();
    writeCache(key, { result, cachedAt, expiresAt: cachedAt + RESULT_CACHE_TTL_MS });
  }
  recordSimulationRun('MISS', steps, result.metadata.durationMs);
  logInfo('simulation_run', {
    steps,
    dt,
    energy: result.energy,
    durationMs: result.metadata.durationMs,
    reason: options.forceRefresh ? 'manual-refresh' : 'miss',
    requestId
  });

  return {
    ...result,
    metadata: { ...result.metadata, requestId }
  };
}
