import { evaluate } from "./evaluator.js";
import { CalcError, type CalcValue, type TokenSequence, type VariableBindings } from "./types.js";
import { real } from "./values.js";

export interface SampleRange {
  start: number;
  end: number;
  step: number;
}

export interface SamplePoint {
  x: number;
  value: CalcValue | null;
  error: CalcError | null;
}

export const MAX_SAMPLES = 100_000;

/** Slack so that an end point reached by accumulated steps is not dropped. */
const STEP_EPSILON = 1e-9;

export function sampleCount(range: SampleRange): number {
  if (!(range.step > 0)) {
    throw new RangeError(`Sample step must be positive, got ${range.step}`);
  }
  if (!(range.end >= range.start)) {
    throw new RangeError(`Sample range end ${range.end} is before start ${range.start}`);
  }
  const count = Math.floor((range.end - range.start) / range.step + STEP_EPSILON) + 1;
  if (count > MAX_SAMPLES) {
    throw new RangeError(`Sample range needs ${count} points, limit is ${MAX_SAMPLES}`);
  }
  return count;
}

/**
 * Evaluates `postfix` at evenly spaced values of `variable`. A point that
 * fails with a CalcError (a pole, a log of zero) is kept with its error so
 * a plot can leave a gap there.
 */
export function sampleRange(
  postfix: TokenSequence,
  variable: string,
  range: SampleRange,
  bindings: VariableBindings = {},
): SamplePoint[] {
  const count = sampleCount(range);
  const points: SamplePoint[] = [];

  for (let i = 0; i < count; i++) {
    const x = Number((range.start + i * range.step).toPrecision(12));
    try {
      const value = evaluate(postfix, { ...bindings, [variable]: real(x) });
      points.push({ x, value, error: null });
    } catch (err) {
      if (!(err instanceof CalcError)) throw err;
      points.push({ x, value: null, error: err });
    }
  }

  return points;
}
