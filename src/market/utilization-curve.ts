import { Fixed6, UFixed6 } from "../math/fixed-point.js";

/**
 * Annualized funding rate as a function of maker utilization.
 *
 * Knots: (0, minRate) → (targetUtilization, targetRate) → (1, maxRate).
 * Past full utilization the last segment is extrapolated.
 */
export interface UtilizationCurve {
  minRate: Fixed6;
  targetRate: Fixed6;
  maxRate: Fixed6;
  targetUtilization: UFixed6;
}

/** Linear interpolation through (x0, y0) and (x1, y1), evaluated at x. */
function interpolate(x0: UFixed6, y0: Fixed6, x1: UFixed6, y1: Fixed6, x: UFixed6): Fixed6 {
  const run = x1.sub(x0);
  const offset = x.toSigned().sub(x0);
  return y0.add(y1.sub(y0).muldiv(offset, run));
}

export function computeRate(curve: UtilizationCurve, utilization: UFixed6): Fixed6 {
  const { minRate, targetRate, maxRate, targetUtilization } = curve;

  if (targetUtilization.isZero()) {
    return interpolate(UFixed6.ZERO, targetRate, UFixed6.ONE, maxRate, utilization);
  }
  if (targetUtilization.gte(UFixed6.ONE) || utilization.lt(targetUtilization)) {
    return interpolate(UFixed6.ZERO, minRate, targetUtilization, targetRate, utilization);
  }
  return interpolate(targetUtilization, targetRate, UFixed6.ONE, maxRate, utilization);
}
