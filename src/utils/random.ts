export type Rng = () => number;

/**
 * Mulberry32 - fast deterministic PRNG, uniform in [0, 1)
 */
export function mulberry32(seed: number): Rng {
  let state = seed >>> 0;
  return function () {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Box-Muller transform for N(0,1)
 */
export function randn(rng: Rng): number {
  let u = 0;
  let v = 0;
  while (u === 0) u = rng();
  while (v === 0) v = rng();
  return Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
}

export function gaussian(rng: Rng, mean: number, sigma: number): number {
  return mean + sigma * randn(rng);
}

export function uniform(rng: Rng, min: number, max: number): number {
  return min + (max - min) * rng();
}

/**
 * Marsaglia-Tsang gamma sampler (scale 1). Shapes below 1 use the
 * U^(1/shape) boost.
 */
export function gamma(rng: Rng, shape: number): number {
  if (shape <= 0) throw new RangeError(`gamma shape must be > 0, got ${shape}`);
  if (shape < 1) {
    let u = 0;
    while (u === 0) u = rng();
    return gamma(rng, shape + 1) * Math.pow(u, 1 / shape);
  }
  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);
  for (;;) {
    let x = 0;
    let v = 0;
    do {
      x = randn(rng);
      v = 1 + c * x;
    } while (v <= 0);
    v = v * v * v;
    const u = rng();
    if (u < 1 - 0.0331 * x * x * x * x) return d * v;
    if (u > 0 && Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v;
  }
}

export function beta(rng: Rng, alpha: number, betaParam: number): number {
  const x = gamma(rng, alpha);
  const y = gamma(rng, betaParam);
  const total = x + y;
  // both draws can underflow to 0 for tiny shapes
  if (total === 0) return alpha / (alpha + betaParam);
  return x / total;
}
