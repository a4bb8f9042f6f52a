import type { Conformation, LossEvaluation } from "../types/geometry.js";

export interface GradientCheckOptions {
  /** Central-difference step, Å. */
  step?: number;
}

export interface GradientCheckResult {
  analytic: Float64Array;
  numeric: Float64Array;
  maxAbsError: number;
  /** Largest |analytic - numeric| / max(1, |analytic|, |numeric|). */
  maxRelError: number;
}

/**
 * Compares an evaluation's analytic gradient with central finite differences over every coordinate.
 * The conformation is copied; the caller's buffer is never touched.
 */
export function checkGradient(
  evaluate: (conf: Conformation) => LossEvaluation,
  conf: Conformation,
  options: GradientCheckOptions = {}
): GradientCheckResult {
  const { step = 1e-6 } = options;
  const positions = Float64Array.from(conf.positions);
  const probe: Conformation = { count: conf.count, positions };
  const analytic = evaluate(probe).gradient;
  const numeric = new Float64Array(positions.length);

  let maxAbsError = 0;
  let maxRelError = 0;
  for (let k = 0; k < positions.length; k++) {
    const x = positions[k];
    positions[k] = x + step;
    const plus = evaluate(probe).value;
    positions[k] = x - step;
    const minus = evaluate(probe).value;
    positions[k] = x;
    numeric[k] = (plus - minus) / (2 * step);

    const err = Math.abs(analytic[k] - numeric[k]);
    maxAbsError = Math.max(maxAbsError, err);
    maxRelError = Math.max(maxRelError, err / Math.max(1, Math.abs(analytic[k]), Math.abs(numeric[k])));
  }
  return { analytic, numeric, maxAbsError, maxRelError };
}
