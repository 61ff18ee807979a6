/**
 * Fixed-step classic Runge–Kutta over a record of named quantities.
 */

export type Vector<K extends string> = Record<K, number>;

export type Derivative<K extends string> = (point: Vector<K>) => Vector<K>;

/**
 * Hook applied to every intermediate point before the derivative sees it,
 * so a stage never evaluates outside the model's domain.
 */
export type StageProjection<K extends string> = (point: Vector<K>) => Vector<K>;

function axpy<K extends string>(keys: readonly K[], base: Vector<K>, slope: Vector<K>, h: number): Vector<K> {
  const out = { ...base };
  for (const key of keys) {
    out[key] = base[key] + h * slope[key];
  }
  return out;
}

export function rk4Step<K extends string>(
  keys: readonly K[],
  y: Vector<K>,
  dt: number,
  derivative: Derivative<K>,
  project: StageProjection<K> = (point) => point
): Vector<K> {
  const k1 = derivative(project(y));
  const k2 = derivative(project(axpy(keys, y, k1, dt / 2)));
  const k3 = derivative(project(axpy(keys, y, k2, dt / 2)));
  const k4 = derivative(project(axpy(keys, y, k3, dt)));

  const out = { ...y };
  for (const key of keys) {
    out[key] = y[key] + (dt / 6) * (k1[key] + 2 * k2[key] + 2 * k3[key] + k4[key]);
  }
  return out;
}

export function eulerStep<K extends string>(
  keys: readonly K[],
  y: Vector<K>,
  dt: number,
  derivative: Derivative<K>,
  project: StageProjection<K> = (point) => point
): Vector<K> {
  return axpy(keys, y, derivative(project(y)), dt);
}
