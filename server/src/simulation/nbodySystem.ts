import { SOLAR_MASS } from '../config/bodies';
import { Body, PLANETS, SUN, updateBody } from './body';
import { add, distance, scale, sub, sum, vec3, Vector3 } from './vector3';

/**
 * Corrige la vitesse de `central` pour que la quantité de mouvement totale
 * de `central` + `others` soit nulle (référentiel barycentrique).
 * Les impulsions de `others` sont sommées dans l'ordre de la liste.
 */
export function offsetMomentum(central: Body, others: readonly Body[]): Body {
  let px = 0;
  let py = 0;
  let pz = 0;
  for (const body of others) {
    px += body.vel.x * body.mass;
    py += body.vel.y * body.mass;
    pz += body.vel.z * body.mass;
  }
  return updateBody(central, {
    vel: vec3(-px / SOLAR_MASS, -py / SOLAR_MASS, -pz / SOLAR_MASS)
  });
}

/**
 * État complet du système à un instant donné. Immuable : `advance` renvoie
 * un nouveau système calculé à partir d'un seul instantané de l'état courant.
 *
 * Deux corps sont distincts s'ils occupent des positions différentes dans la
 * séquence ; le nom n'intervient jamais dans les calculs.
 */
export class NBodySystem {
  readonly bodies: readonly Body[];

  private constructor(bodies: readonly Body[]) {
    this.bodies = Object.freeze([...bodies]);
  }

  /** Soleil + quatre planètes géantes, soleil corrigé, dans cet ordre. */
  static create(): NBodySystem {
    const sun = offsetMomentum(SUN, PLANETS);
    return new NBodySystem([sun, ...PLANETS]);
  }

  static of(bodies: readonly Body[]): NBodySystem {
    return new NBodySystem(bodies);
  }

  get size(): number {
    return this.bodies.length;
  }

  names(): string[] {
    return this.bodies.map((b) => b.name);
  }

  /** Un pas d'Euler semi-implicite : vitesse d'abord, puis position avec la nouvelle vitesse. */
  advance(dt: number): NBodySystem {
    const snapshot = this.bodies;
    const next = snapshot.map((body, i) => {
      const contributions: Vector3[] = [];
      snapshot.forEach((other, j) => {
        if (i === j) {
          return;
        }
        const dist = distance(body.pos, other.pos);
        const mag = dt / (dist * dist * dist);
        contributions.push(scale(sub(other.pos, body.pos), other.mass * mag));
      });
      const vel = add(body.vel, sum(contributions));
      const pos = add(body.pos, scale(vel, dt));
      return updateBody(body, { vel, pos });
    });
    return new NBodySystem(next);
  }

  kineticEnergy(): number {
    let total = 0;
    for (const { mass, vel } of this.bodies) {
      total += 0.5 * mass * (vel.x * vel.x + vel.y * vel.y + vel.z * vel.z);
    }
    return total;
  }

  /**
   * Produit cartésien complet : chaque paire non ordonnée apparaît deux fois,
   * d'où la division par deux appliquée une seule fois sur le total.
   */
  potentialEnergy(): number {
    let total = 0;
    this.bodies.forEach((b1, i) => {
      this.bodies.forEach((b2, j) => {
        if (i !== j) {
          total += (b1.mass * b2.mass) / distance(b1.pos, b2.pos);
        }
      });
    });
    return total * 0.5;
  }

  energy(): number {
    return this.kineticEnergy() - this.potentialEnergy();
  }

  momentum(): Vector3 {
    return sum(this.bodies.map((b) => scale(b.vel, b.mass)));
  }
}
