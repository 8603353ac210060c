import { isFunctionName } from "./functions.js";
import { isSign, shouldPopBefore } from "./operators.js";
import { CalcError, NO_POS, type Token, type TokenSequence } from "./types.js";

/**
 * Shunting-Yard conversion of a validated infix sequence to postfix order.
 *
 * A `+`/`-` read while `expectUnary` is set (start of input, after `(`,
 * after any operator or function name) becomes a unary operator. Function
 * names wait on the stack until their closing parenthesis resolves.
 */
export function toPostfix(tokens: TokenSequence): Token[] {
  const output: Token[] = [];
  const stack: Token[] = [];
  let expectUnary = true;

  for (const tok of tokens) {
    switch (tok.kind) {
      case "number":
        output.push(tok);
        expectUnary = false;
        break;

      case "identifier":
        if (isFunctionName(tok.name)) {
          stack.push(tok);
          expectUnary = true;
        } else {
          output.push(tok);
          expectUnary = false;
        }
        break;

      case "open":
        stack.push(tok);
        expectUnary = true;
        break;

      case "close": {
        let top = stack.pop();
        while (top !== undefined && top.kind !== "open") {
          output.push(top);
          top = stack.pop();
        }
        const fn = stack[stack.length - 1];
        if (fn?.kind === "identifier") {
          stack.pop();
          output.push(fn);
        }
        expectUnary = false;
        break;
      }

      case "operator":
        if (expectUnary && isSign(tok.symbol)) {
          stack.push({ ...tok, arity: "unary" });
        } else {
          let top = stack[stack.length - 1];
          while (top?.kind === "operator" && shouldPopBefore(top, tok.symbol)) {
            stack.pop();
            output.push(top);
            top = stack[stack.length - 1];
          }
          stack.push({ ...tok, arity: "binary" });
        }
        expectUnary = true;
        break;
    }
  }

  for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
    if (top.kind !== "open") output.push(top);
  }

  return output;
}

interface PrefixNode {
  text: string;
  atomic: boolean;
}

function popNode(stack: PrefixNode[], tok: Token): PrefixNode {
  const node = stack.pop();
  if (node === undefined) throw new CalcError("MALFORMED_EXPRESSION", tok.pos);
  return node;
}

/**
 * Prefix (Polish) rendering of an infix sequence: `op a b` for binary
 * nodes, `-a` or `-(…)` for unary signs, `name(arg)` for functions.
 */
export function toPrefix(tokens: TokenSequence): string {
  const stack: PrefixNode[] = [];

  for (const tok of toPostfix(tokens)) {
    switch (tok.kind) {
      case "number":
        stack.push({ text: tok.text, atomic: true });
        break;

      case "identifier":
        if (isFunctionName(tok.name)) {
          const arg = popNode(stack, tok);
          stack.push({ text: `${tok.name}(${arg.text})`, atomic: true });
        } else {
          stack.push({ text: tok.name, atomic: true });
        }
        break;

      case "operator":
        if (tok.arity === "unary") {
          const operand = popNode(stack, tok);
          const text = operand.atomic ? operand.text : `(${operand.text})`;
          stack.push({ text: `${tok.symbol}${text}`, atomic: true });
        } else {
          const right = popNode(stack, tok);
          const left = popNode(stack, tok);
          stack.push({ text: `${tok.symbol} ${left.text} ${right.text}`, atomic: false });
        }
        break;

      case "open":
      case "close":
        throw new CalcError("MALFORMED_EXPRESSION", tok.pos, tok.kind === "open" ? "(" : ")");
    }
  }

  const [root, ...rest] = stack;
  if (root === undefined || rest.length > 0) {
    throw new CalcError("MALFORMED_EXPRESSION", NO_POS);
  }
  return root.text;
}
