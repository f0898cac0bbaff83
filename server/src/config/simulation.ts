/**
 * Valeur numérique d'environnement ; absente, non numérique ou hors bornes,
 * on garde la valeur par défaut.
 */
export function envNumber(
  raw: string | undefined,
  fallback: number,
  options: { integer?: boolean; min?: number } = {}
): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    return fallback;
  }
  if (options.integer && !Number.isInteger(value)) {
    return fallback;
  }
  if (options.min !== undefined && value < options.min) {
    return fallback;
  }
  return value;
}

export const PORT = envNumber(process.env.PORT, 3000, { integer: true, min: 0 });

export const DEFAULT_DT = envNumber(process.env.NBODY_DEFAULT_DT, 0.01);
export const DEFAULT_STEPS = envNumber(process.env.NBODY_DEFAULT_STEPS, 1000, { integer: true, min: 0 });
// La boucle est synchrone : on borne le nombre de pas par requête.
export const MAX_STEPS = envNumber(process.env.NBODY_MAX_STEPS, 200_000, { integer: true, min: 0 });

export const RESULT_CACHE_TTL_MS = envNumber(process.env.NBODY_CACHE_TTL_MS, 10 * 60 * 1000, { min: 0 });
export const RESULT_CACHE_MAX_ENTRIES = envNumber(process.env.NBODY_CACHE_MAX_ENTRIES, 64, {
  integer: true,
  min: 0
});

export const DEBUG_ASSERTIONS =
  process.env.NBODY_DEBUG_ASSERTIONS === '1' || process.env.NBODY_DEBUG_ASSERTIONS === 'true';
