/**
 * Minimal linear scale with a chainable builder API.
 *
 * `scale()` maps domain -> range, `invert()` maps range -> domain. A zero-width domain maps every
 * value to the midpoint of the range instead of dividing by zero.
 */
export interface LinearScale {
  domain(min: number, max: number): LinearScale;
  range(min: number, max: number): LinearScale;
  scale(value: number): number;
  invert(pixel: number): number;
}

export function createLinearScale(): LinearScale {
  let d0 = 0;
  let d1 = 1;
  let r0 = 0;
  let r1 = 1;

  const self: LinearScale = {
    domain(min, max) {
      d0 = min;
      d1 = max;
      return self;
    },
    range(min, max) {
      r0 = min;
      r1 = max;
      return self;
    },
    scale(value) {
      const span = d1 - d0;
      if (span === 0) return (r0 + r1) / 2;
      return r0 + ((value - d0) / span) * (r1 - r0);
    },
    invert(pixel) {
      const span = r1 - r0;
      if (span === 0) return (d0 + d1) / 2;
      return d0 + ((pixel - r0) / span) * (d1 - d0);
    },
  };

  return self;
}
