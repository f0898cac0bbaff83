import { Router, Request, Response } from 'express';

import { BODY_BY_ID, isBodyId } from '../config/bodies';
import { DEFAULT_DT, DEFAULT_STEPS, MAX_STEPS } from '../config/simulation';
import { errorMessage, logError } from '../observability/logger';
import {
  formatEnergy,
  getInitialConditions,
  runSimulation,
  SimulationResult
} from '../services/simulationService';

export interface SimulationQuery {
  steps: number;
  dt: number;
}

export type ParseResult =
  | { ok: true; value: SimulationQuery }
  | { ok: false; error: string };

type QueryValue = Request['query'][string];

const STEPS_PATTERN = /^\d+$/;
const DT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// absent -> null ; présent mais pas une chaîne simple -> undefined
function scalarText(value: QueryValue): string | null | undefined {
  if (value === undefined) {
    return null;
  }
  return typeof value === 'string' ? value.trim() : undefined;
}

export function parseSimulationQuery(
  query: Request['query'],
  limits: { maxSteps: number; defaultSteps: number; defaultDt: number } = {
    maxSteps: MAX_STEPS,
    defaultSteps: DEFAULT_STEPS,
    defaultDt: DEFAULT_DT
  }
): ParseResult {
  const rawSteps = scalarText(query.steps);
  if (rawSteps === undefined || (rawSteps !== null && !STEPS_PATTERN.test(rawSteps))) {
    return { ok: false, error: 'steps doit être un entier positif ou nul' };
  }
  const steps = rawSteps === null ? limits.defaultSteps : Number(rawSteps);
  if (steps > limits.maxSteps) {
    return { ok: false, error: `steps ne peut pas dépasser ${limits.maxSteps}` };
  }

  const rawDt = scalarText(query.dt);
  if (rawDt === undefined || (rawDt !== null && !DT_PATTERN.test(rawDt))) {
    return { ok: false, error: 'dt doit être un nombre fini' };
  }
  const dt = rawDt === null ? limits.defaultDt : Number(rawDt);
  if (!Number.isFinite(dt)) {
    return { ok: false, error: 'dt doit être un nombre fini' };
  }

  return { ok: true, value: { steps, dt } };
}

function isTrueFlag(value: unknown): boolean {
  return typeof value === 'string' && ['1', 'true'].includes(value.trim().toLowerCase());
}

/** `?refresh=1|true` ou en-tête `x-refresh-cache`, valeurs répétées comprises. */
export function parseForceRefresh(req: Pick<Request, 'query' | 'headers'>): boolean {
  const candidates: unknown[] = [];
  for (const value of [req.query.refresh, req.headers['x-refresh-cache']]) {
    if (Array.isArray(value)) {
      candidates.push(...value);
    } else {
      candidates.push(value);
    }
  }
  return candidates.some(isTrueFlag);
}

export function toEnergyPayload(result: SimulationResult) {
  return {
    steps: result.steps,
    dt: result.dt,
    initialEnergy: result.initialEnergy,
    energy: result.energy,
    formatted: {
      initial: formatEnergy(result.initialEnergy),
      final: formatEnergy(result.energy)
    },
    metadata: result.metadata
  };
}

function handleSimulationRequest(
  req: Request,
  res: Response,
  render: (result: SimulationResult) => unknown
): void {
  const requestId = req.requestId;
  const parsed = parseSimulationQuery(req.query);
  if (!parsed.ok) {
    res.status(400).json({ error: parsed.error, requestId });
    return;
  }

  try {
    const result = runSimulation({
      ...parsed.value,
      forceRefresh: parseForceRefresh(req),
      requestId
    });
    res.setHeader('X-Nbody-Cache', result.metadata.cacheStatus);
    res.setHeader('X-Nbody-Duration', result.metadata.durationMs.toString());
    res.json(render(result));
  } catch (err: unknown) {
    logError('simulation_request_failed', {
      error: errorMessage(err),
      requestId,
      query: req.query
    });
    res.status(500).json({ error: 'Erreur lors de la simulation', requestId });
  }
}

const router = Router();

router.get('/bodies', (_req, res) => {
  res.json({ bodies: getInitialConditions() });
});

router.get('/bodies/:id', (req: Request, res: Response) => {
  const id = req.params.id;
  if (!isBodyId(id)) {
    res.status(404).json({ error: 'Unknown body id', requestId: req.requestId });
    return;
  }
  const body = getInitialConditions().find((b) => b.name === id);
  res.json({ ...body, config: BODY_BY_ID.get(id) });
});

router.get('/energy', (req, res) => handleSimulationRequest(req, res, toEnergyPayload));
router.get('/state', (req, res) => handleSimulationRequest(req, res, (result) => result));

export default router;
