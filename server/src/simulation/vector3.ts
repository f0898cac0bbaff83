export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export function vec3(x: number, y: number, z: number): Vector3 {
  return Object.freeze({ x, y, z });
}

export const ZERO: Vector3 = vec3(0, 0, 0);

export function add(a: Vector3, b: Vector3): Vector3 {
  return vec3(a.x + b.x, a.y + b.y, a.z + b.z);
}

export function sub(a: Vector3, b: Vector3): Vector3 {
  return vec3(a.x - b.x, a.y - b.y, a.z - b.z);
}

export function scale(v: Vector3, s: number): Vector3 {
  return vec3(v.x * s, v.y * s, v.z * s);
}

export function magnitude(v: Vector3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

export function distance(a: Vector3, b: Vector3): number {
  return magnitude(sub(a, b));
}

/**
 * Somme gauche -> droite depuis ZERO. L'ordre compte : l'addition flottante
 * n'est pas associative et les résultats de référence en dépendent.
 */
export function sum(vectors: readonly Vector3[]): Vector3 {
  return vectors.reduce<Vector3>((acc, v) => add(acc, v), ZERO);
}
