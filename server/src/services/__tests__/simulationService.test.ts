import { beforeEach, describe, expect, it } from 'vitest';
import {
  clearSimulationCache,
  formatEnergy,
  getInitialConditions,
  runSimulation,
  simulate,
  simulationCacheSize,
  toBodySnapshot
} from '../simulationService';
import { NBodySystem } from '../../simulation/nbodySystem';
import { createBody } from '../../simulation/body';
import { vec3 } from '../../simulation/vector3';

describe('simulationService', () => {
  beforeEach(() => {
    clearSimulationCache();
  });

  it('formats energies like the benchmark', () => {
    expect(formatEnergy(-0.1690751638285245)).toBe('-0.169075164');
    expect(formatEnergy(-0.16908760523460656)).toBe('-0.169087605');
  });

  it('exposes barycentric initial conditions with display names', () => {
    const bodies = getInitialConditions();
    expect(bodies.map((b) => b.displayName)).toEqual(['Soleil', 'Jupiter', 'Saturne', 'Uranus', 'Neptune']);
    expect(bodies[0].vx).toBe(NBodySystem.create().bodies[0].vel.x);
  });

  it('falls back to the raw name for unknown bodies', () => {
    const snapshot = toBodySnapshot(createBody('probe', 1, vec3(1, 2, 3), vec3(4, 5, 6)));
    expect(snapshot).toEqual({
      name: 'probe',
      displayName: 'probe',
      mass: 1,
      x: 1,
      y: 2,
      z: 3,
      vx: 4,
      vy: 5,
      vz: 6
    });
  });

  it('chains advance calls', () => {
    const expected = NBodySystem.create().advance(0.01).advance(0.01).energy();
    expect(simulate(2, 0.01).energy()).toBe(expected);
  });

  it('reports zero drift for zero steps', () => {
    const result = runSimulation({ steps: 0, dt: 0.01 });
    expect(result.energy).toBe(result.initialEnergy);
    expect(result.energyDrift).toBe(0);
    expect(result.bodies).toHaveLength(5);
    expect(result.metadata.cacheStatus).toBe('MISS');
  });

  it('computes one step of the standard system', () => {
    const result = runSimulation({ steps: 1, dt: 0.01, requestId: 'req-1' });
    expect(result.energy).toBe(NBodySystem.create().advance(0.01).energy());
    expect(result.metadata.requestId).toBe('req-1');
  });

  it('serves repeated runs from the cache', () => {
    const first = runSimulation({ steps: 3, dt: 0.01, requestId: 'a' });
    const second = runSimulation({ steps: 3, dt: 0.01, requestId: 'b' });

    expect(first.metadata.cacheStatus).toBe('MISS');
    expect(second.metadata.cacheStatus).toBe('HIT');
    expect(second.metadata.requestId).toBe('b');
    expect(second.energy).toBe(first.energy);
    expect(simulationCacheSize()).toBe(1);
  });

  it('hands out frozen body snapshots so the cache cannot be altered', () => {
    const first = runSimulation({ steps: 1, dt: 0.01 });
    expect(Object.isFrozen(first.bodies)).toBe(true);
    expect(first.bodies.every((body) => Object.isFrozen(body))).toBe(true);
    expect(Reflect.set(first.bodies[1], 'x', 0)).toBe(false);

    const second = runSimulation({ steps: 1, dt: 0.01 });
    expect(second.metadata.cacheStatus).toBe('HIT');
    expect(second.bodies[1].x).toBe(NBodySystem.create().advance(0.01).bodies[1].pos.x);
  });

  it('recomputes on forced refresh', () => {
    runSimulation({ steps: 2, dt: 0.01 });
    const refreshed = runSimulation({ steps: 2, dt: 0.01, forceRefresh: true });
    expect(refreshed.metadata.cacheStatus).toBe('MISS');
    expect(simulationCacheSize()).toBe(1);
  });

  it('keys the cache on dt as well as steps', () => {
    runSimulation({ steps: 1, dt: 0.01 });
    const other = runSimulation({ steps: 1, dt: 0.02 });
    expect(other.metadata.cacheStatus).toBe('MISS');
    expect(simulationCacheSize()).toBe(2);
  });

  it('evicts the oldest entry past the size limit', () => {
    for (let i = 0; i <= 64; i++) {
      runSimulation({ steps: 0, dt: i });
    }
    expect(simulationCacheSize()).toBe(64);
    expect(runSimulation({ steps: 0, dt: 64 }).metadata.cacheStatus).toBe('HIT');
    expect(runSimulation({ steps: 0, dt: 0 }).metadata.cacheStatus).toBe('MISS');
  });
});
