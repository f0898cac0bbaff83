import { BODY_BY_ID, BodyId, DAYS_PER_YEAR, SOLAR_MASS } from '../config/bodies';
import { scale, vec3, Vector3 } from './vector3';

export interface Body {
  readonly name: string;
  readonly mass: number;
  readonly pos: Vector3;
  readonly vel: Vector3;
}

export type BodyUpdate = Partial<Pick<Body, 'pos' | 'vel'>>;

export function createBody(name: string, mass: number, pos: Vector3, vel: Vector3): Body {
  return Object.freeze({ name, mass, pos, vel });
}

/** Copie du corps avec `pos` et/ou `vel` remplacés ; l'original n'est jamais modifié. */
export function updateBody(body: Body, changes: BodyUpdate): Body {
  return createBody(body.name, body.mass, changes.pos ?? body.pos, changes.vel ?? body.vel);
}

function fromConfig(id: BodyId): Body {
  const cfg = BODY_BY_ID.get(id);
  if (!cfg) {
    throw new Error(`Corps inconnu: ${id}`);
  }
  const [x, y, z] = cfg.position_au;
  const [vx, vy, vz] = cfg.velocity_au_per_day;
  return createBody(
    cfg.id,
    cfg.massSolar * SOLAR_MASS,
    vec3(x, y, z),
    scale(vec3(vx, vy, vz), DAYS_PER_YEAR)
  );
}

export const SUN = fromConfig('sun');
export const JUPITER = fromConfig('jupiter');
export const SATURN = fromConfig('saturn');
export const URANUS = fromConfig('uranus');
export const NEPTUNE = fromConfig('neptune');

export const PLANETS: readonly Body[] = [JUPITER, SATURN, URANUS, NEPTUNE];
