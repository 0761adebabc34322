export interface RandomSource {
  gaussian(mean: number, stddev: number): number;
}

/** Box-Muller over `uniform`, which must return values in [0, 1). */
export function createRandomSource(uniform: () => number = Math.random): RandomSource {
  return {
    gaussian(mean, stddev) {
      let u = 0;
      let v = 0;
      while (u === 0) u = uniform();
      while (v === 0) v = uniform();
      const z = Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
      return mean + stddev * z;
    },
  };
}
