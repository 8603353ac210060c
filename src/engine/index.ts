/**
 * Infix expression engine: lexer → validator → Shunting-Yard converter →
 * postfix evaluator, with formatting, bindings and range sampling on top.
 */

export * from "./types.js";
export { tokenize, cleanExpression } from "./lexer.js";
export { validate, assertValid } from "./validator.js";
export { toPostfix, toPrefix } from "./converter.js";
export { evaluate } from "./evaluator.js";
export { compile, calculate } from "./calculate.js";
export { formatValue, formatNumber, formatPostfix, tokenText, DEFAULT_DISPLAY_PRECISION } from "./format.js";
export { CONSTANTS, defaultBindings, freeVariables, bindFreeVariables, type RandomBindingOptions } from "./bindings.js";
export { sampleRange, sampleCount, MAX_SAMPLES, type SampleRange, type SamplePoint } from "./sampler.js";
export { describeError } from "./messages.js";
export { FUNCTIONS, isFunctionName, type FunctionRule } from "./functions.js";
export { OPERATORS, UNARY_PRECEDENCE, type OperatorSpec, type BinaryOp, type Associativity } from "./operators.js";
export { real, complexValue } from "./values.js";
