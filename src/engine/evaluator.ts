import { add, divide, multiply, pow, subtract, type Complex } from "mathjs";
import { applyFunction, isFunctionName } from "./functions.js";
import { OPERATORS, type BinaryOp } from "./operators.js";
import {
  CalcError,
  NO_POS,
  type CalcValue,
  type OperatorToken,
  type Token,
  type TokenSequence,
  type VariableBindings,
} from "./types.js";
import { complexValue, fromMath, isZero, real, toComplex, toValue } from "./values.js";

function arithmetic(
  a: CalcValue,
  b: CalcValue,
  realOp: (x: number, y: number) => number,
  complexOp: (x: Complex, y: Complex) => unknown,
  pos: number,
): CalcValue {
  if (a.kind === "real" && b.kind === "real") return real(realOp(a.value, b.value));
  return fromMath(complexOp(toComplex(a), toComplex(b)), pos);
}

/** Operands of `%` and `//`: both real, checked before the zero divisor. */
function realOperands(a: CalcValue, b: CalcValue, tok: OperatorToken): [number, number] {
  if (a.kind === "complex" || b.kind === "complex") {
    throw new CalcError("COMPLEX_NOT_SUPPORTED", tok.pos, tok.symbol);
  }
  if (b.value === 0) {
    throw new CalcError("DIVISION_BY_ZERO", tok.pos, tok.symbol);
  }
  return [a.value, b.value];
}

function applyBinary(op: BinaryOp, a: CalcValue, b: CalcValue, tok: OperatorToken): CalcValue {
  switch (op) {
    case "add":
      return arithmetic(a, b, (x, y) => x + y, (x, y) => add(x, y), tok.pos);
    case "subtract":
      return arithmetic(a, b, (x, y) => x - y, (x, y) => subtract(x, y), tok.pos);
    case "multiply":
      return arithmetic(a, b, (x, y) => x * y, (x, y) => multiply(x, y), tok.pos);
    case "divide":
      if (isZero(b)) throw new CalcError("DIVISION_BY_ZERO", tok.pos, tok.symbol);
      return arithmetic(a, b, (x, y) => x / y, (x, y) => divide(x, y), tok.pos);
    case "modulo": {
      // Floored: the result takes the divisor's sign, so -7 % 3 = 2.
      const [x, y] = realOperands(a, b, tok);
      return real(x - y * Math.floor(x / y));
    }
    case "floorDivide": {
      const [x, y] = realOperands(a, b, tok);
      return real(Math.floor(x / y));
    }
    case "power":
      if (a.kind === "real" && b.kind === "real") return fromMath(pow(a.value, b.value), tok.pos);
      return fromMath(pow(toComplex(a), toComplex(b)), tok.pos);
  }
}

function negate(v: CalcValue): CalcValue {
  return v.kind === "real" ? real(-v.value) : complexValue(-v.re, -v.im);
}

function lookup(name: string, bindings: VariableBindings, pos: number): CalcValue {
  if (!Object.prototype.hasOwnProperty.call(bindings, name)) {
    throw new CalcError("UNDEFINED_VARIABLE", pos, name);
  }
  const bound = bindings[name];
  if (bound === undefined) {
    throw new CalcError("UNDEFINED_VARIABLE", pos, name);
  }
  return toValue(bound);
}

function pop(stack: CalcValue[], tok: Token): CalcValue {
  const value = stack.pop();
  if (value === undefined) throw new CalcError("MALFORMED_EXPRESSION", tok.pos);
  return value;
}

/**
 * Evaluates a postfix sequence against variable bindings. The sequence is
 * not modified, so one compiled expression can be evaluated repeatedly.
 */
export function evaluate(postfix: TokenSequence, bindings: VariableBindings = {}): CalcValue {
  const stack: CalcValue[] = [];

  for (const tok of postfix) {
    switch (tok.kind) {
      case "number":
        stack.push(real(Number(tok.text)));
        break;

      case "identifier":
        if (isFunctionName(tok.name)) {
          stack.push(applyFunction(tok.name, pop(stack, tok), tok.pos));
        } else {
          stack.push(lookup(tok.name, bindings, tok.pos));
        }
        break;

      case "operator":
        if (tok.arity === "unary") {
          const operand = pop(stack, tok);
          stack.push(tok.symbol === "-" ? negate(operand) : operand);
        } else {
          const b = pop(stack, tok);
          const a = pop(stack, tok);
          stack.push(applyBinary(OPERATORS[tok.symbol].op, a, b, tok));
        }
        break;

      case "open":
      case "close":
        throw new CalcError("MALFORMED_EXPRESSION", tok.pos, tok.kind === "open" ? "(" : ")");
    }
  }

  const [result, ...rest] = stack;
  if (result === undefined || rest.length > 0) {
    throw new CalcError("MALFORMED_EXPRESSION", NO_POS, String(stack.length));
  }
  return result;
}
