import { isFunctionName } from "./functions.js";
import type { CalcValue, TokenSequence, VariableBindings } from "./types.js";
import { complexValue, real } from "./values.js";

/** Predefined constants. `j` is the imaginary unit. */
export const CONSTANTS: Readonly<Record<string, CalcValue>> = Object.freeze({
  pi: real(Math.PI),
  e: real(Math.E),
  PI: real(Math.PI),
  E: real(Math.E),
  j: complexValue(0, 1),
});

/** Constants overlaid with caller bindings; the caller wins on a clash. */
export function defaultBindings(overrides: VariableBindings = {}): VariableBindings {
  return { ...CONSTANTS, ...overrides };
}

function isBound(name: string, bindings: VariableBindings): boolean {
  return Object.prototype.hasOwnProperty.call(bindings, name) && bindings[name] !== undefined;
}

/** Variable names the sequence reads that `bindings` does not supply, in first-seen order. */
export function freeVariables(tokens: TokenSequence, bindings: VariableBindings = {}): string[] {
  const seen = new Set<string>();
  for (const tok of tokens) {
    if (tok.kind !== "identifier" || isFunctionName(tok.name)) continue;
    if (isBound(tok.name, bindings)) continue;
    seen.add(tok.name);
  }
  return [...seen];
}

export interface RandomBindingOptions {
  min: number;
  max: number;
  /** Uniform source on [0, 1). Defaults to Math.random. */
  random?: () => number;
}

/**
 * Returns a copy of `bindings` in which every free variable of `tokens` is
 * bound to a uniform random real on [min, max].
 */
export function bindFreeVariables(
  tokens: TokenSequence,
  bindings: VariableBindings,
  options: RandomBindingOptions,
): VariableBindings {
  const random = options.random ?? Math.random;
  const bound: Record<string, number | CalcValue> = { ...bindings };
  for (const name of freeVariables(tokens, bindings)) {
    bound[name] = real(options.min + random() * (options.max - options.min));
  }
  return bound;
}
