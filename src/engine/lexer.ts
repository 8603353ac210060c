import { LONG_OPERATORS, isBinarySymbol, isSign } from "./operators.js";
import {
  CalcError,
  type Arity,
  type BinarySymbol,
  type IdentifierToken,
  type NumberToken,
  type Token,
} from "./types.js";

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isAlpha(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

/**
 * Drops a trailing `# comment`, collapses whitespace runs, and accepts `,`
 * as a decimal separator.
 */
export function cleanExpression(expression: string): string {
  const hash = expression.indexOf("#");
  const code = hash === -1 ? expression : expression.slice(0, hash);
  return code.split(/\s+/).filter((part) => part.length > 0).join(" ").replace(/,/g, ".");
}

function readNumber(input: string, start: number): NumberToken {
  let i = start;
  let seenDot = false;
  while (i < input.length) {
    const ch = input.charAt(i);
    if (isDigit(ch)) {
      i++;
    } else if (ch === "." && !seenDot) {
      seenDot = true;
      i++;
    } else {
      break;
    }
  }
  return { kind: "number", text: input.slice(start, i), pos: start };
}

function readIdent(input: string, start: number): IdentifierToken {
  let i = start + 1;
  while (i < input.length && (isAlpha(input.charAt(i)) || isDigit(input.charAt(i)))) i++;
  return { kind: "identifier", name: input.slice(start, i), pos: start };
}

/** A sign is unary at the start, after `(`, or after another operator. */
function arityAt(symbol: BinarySymbol, previous: Token | undefined): Arity {
  if (!isSign(symbol)) return "binary";
  if (previous === undefined || previous.kind === "open" || previous.kind === "operator") return "unary";
  return "binary";
}

function readOperator(input: string, start: number): BinarySymbol | undefined {
  const pair = input.slice(start, start + 2);
  for (const long of LONG_OPERATORS) {
    if (pair === long) return long;
  }
  const single = input.charAt(start);
  return isBinarySymbol(single) ? single : undefined;
}

export function tokenize(expression: string): Token[] {
  const input = cleanExpression(expression);
  const tokens: Token[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input.charAt(i);

    if (isWhitespace(ch)) {
      i++;
      continue;
    }

    if (isDigit(ch) || (ch === "." && isDigit(input.charAt(i + 1)))) {
      const tok = readNumber(input, i);
      tokens.push(tok);
      i += tok.text.length;
      continue;
    }

    if (isAlpha(ch)) {
      const tok = readIdent(input, i);
      tokens.push(tok);
      i += tok.name.length;
      continue;
    }

    if (ch === "(") {
      tokens.push({ kind: "open", pos: i });
      i++;
      continue;
    }

    if (ch === ")") {
      tokens.push({ kind: "close", pos: i });
      i++;
      continue;
    }

    const symbol = readOperator(input, i);
    if (symbol !== undefined) {
      tokens.push({ kind: "operator", symbol, arity: arityAt(symbol, tokens[tokens.length - 1]), pos: i });
      i += symbol.length;
      continue;
    }

    throw new CalcError("INVALID_CHARACTER", i, ch);
  }

  return tokens;
}
