export type BodyId = 'sun' | 'jupiter' | 'saturn' | 'uranus' | 'neptune';

export interface BodyConfig {
  id: BodyId;
  displayName: string;
  // fraction de SOLAR_MASS
  massSolar: number;
  position_au: [number, number, number];
  velocity_au_per_day: [number, number, number];
}

const PI = 3.141592653589793;
export const SOLAR_MASS = 4 * PI * PI;
export const DAYS_PER_YEAR = 365.24;

export const BODIES: BodyConfig[] = [
  {
    id: 'sun',
    displayName: 'Soleil',
    massSolar: 1,
    position_au: [0, 0, 0],
    velocity_au_per_day: [0, 0, 0]
  },
  {
    id: 'jupiter',
    displayName: 'Jupiter',
    massSolar: 9.54791938424326609e-4,
    position_au: [4.8414314424647209, -1.16032004402742839, -1.03622044471123109e-1],
    velocity_au_per_day: [1.66007664274403694e-3, 7.69901118419740425e-3, -6.90460016972063023e-5]
  },
  {
    id: 'saturn',
    displayName: 'Saturne',
    massSolar: 2.85885980666130812e-4,
    position_au: [8.34336671824457987, 4.12479856412430479, -4.03523417114321381e-1],
    velocity_au_per_day: [-2.76742510726862411e-3, 4.99852801234917238e-3, 2.30417297573763929e-5]
  },
  {
    id: 'uranus',
    displayName: 'Uranus',
    massSolar: 4.36624404335156298e-5,
    position_au: [1.2894369562139131e1, -1.51111514016986312e1, -2.23307578892655734e-1],
    velocity_au_per_day: [2.96460137564761618e-3, 2.3784717395948095e-3, -2.96589568540237556e-5]
  },
  {
    id: 'neptune',
    displayName: 'Neptune',
    massSolar: 5.15138902046611451e-5,
    position_au: [1.53796971148509165e1, -2.59193146099879641e1, 1.79258772950371181e-1],
    velocity_au_per_day: [2.68067772490389322e-3, 1.62824170038242295e-3, -9.5159225451971587e-5]
  }
];

export const BODY_BY_ID = new Map<BodyId, BodyConfig>(BODIES.map((b) => [b.id, b]));

const BODY_ID_SET = new Set<string>(BODIES.map((b) => b.id));

export function isBodyId(value: string): value is BodyId {
  return BODY_ID_SET.has(value);
}
