import type { SkillDefinition, ToolDefinition, ToolResult } from "../../types.js";
import { getEngineConfig } from "../../../config/engine-config.js";
import {
  CalcError,
  bindFreeVariables,
  compile,
  defaultBindings,
  describeError,
  evaluate,
  formatNumber,
  formatPostfix,
  formatValue,
  isInternalError,
  sampleRange,
  toPrefix,
  type SampleRange,
} from "../../../engine/index.js";
import { devError } from "../../../shared/index.js";

type CalcMode = "evaluate" | "postfix" | "prefix" | "sample";

const MODES: readonly CalcMode[] = ["evaluate", "postfix", "prefix", "sample"];

interface CalcInput {
  expression: string;
  mode: CalcMode;
  variables: Record<string, number>;
  randomize: boolean;
  variable: string;
  range?: SampleRange;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isMode(value: unknown): value is CalcMode {
  return MODES.some((m) => m === value);
}

function parseVariables(raw: unknown): Record<string, number> | undefined {
  if (raw === undefined) return {};
  if (!isRecord(raw)) return undefined;
  const out: Record<string, number> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value !== "number" || !Number.isFinite(value)) return undefined;
    out[name] = value;
  }
  return out;
}

function parseRange(raw: unknown): SampleRange | undefined | null {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) return null;
  const start = raw["start"];
  const end = raw["end"];
  const step = raw["step"];
  if (typeof start !== "number" || typeof end !== "number" || typeof step !== "number") return null;
  return { start, end, step };
}

function validateInput(input: unknown): CalcInput | ToolResult {
  if (!isRecord(input)) {
    return { ok: false, error: "Invalid input: expected object." };
  }

  const v = input;
  const expression = v["expression"];
  if (typeof expression !== "string" || expression.trim().length === 0) {
    return { ok: false, error: "Invalid input: expression must be a non-empty string." };
  }

  const mode = v["mode"] ?? "evaluate";
  if (!isMode(mode)) {
    return { ok: false, error: `Invalid input: mode must be one of ${MODES.join(", ")}.` };
  }

  const variables = parseVariables(v["variables"]);
  if (variables === undefined) {
    return { ok: false, error: "Invalid input: variables must map names to finite numbers." };
  }

  const range = parseRange(v["range"]);
  if (range === null) {
    return { ok: false, error: "Invalid input: range needs numeric start, end and step." };
  }

  const variable = v["variable"] ?? "x";
  if (typeof variable !== "string" || variable.length === 0) {
    return { ok: false, error: "Invalid input: variable must be a non-empty string." };
  }

  return {
    expression: expression.trim(),
    mode,
    variables,
    randomize: v["randomize"] === true,
    variable,
    range,
  };
}

function run(parsed: CalcInput): { output: string; meta: Record<string, unknown> } {
  const config = getEngineConfig();
  const compiled = compile(parsed.expression);
  const postfix = formatPostfix(compiled.postfix);

  switch (parsed.mode) {
    case "postfix":
      return { output: postfix, meta: {} };

    case "prefix":
      return { output: toPrefix(compiled.tokens), meta: { postfix } };

    case "evaluate": {
      let bindings = defaultBindings(parsed.variables);
      if (parsed.randomize) {
        bindings = bindFreeVariables(compiled.postfix, bindings, config.random);
      }
      const value = evaluate(compiled.postfix, bindings);
      return { output: formatValue(value, config.displayPrecision), meta: { postfix } };
    }

    case "sample": {
      const range = parsed.range ?? config.sampling;
      const points = sampleRange(compiled.postfix, parsed.variable, range, defaultBindings(parsed.variables));
      const lines = points.map((p) => {
        const y = p.value === null ? (p.error?.code ?? "undefined") : formatValue(p.value, config.displayPrecision);
        return `${formatNumber(p.x, config.displayPrecision)} -> ${y}`;
      });
      return {
        output: lines.join("\n"),
        meta: { postfix, points: points.length, failures: points.filter((p) => p.error !== null).length },
      };
    }
  }
}

export const calculatorTool: ToolDefinition = {
  name: "calculator",
  description: "Convert an infix expression to postfix or prefix notation, evaluate it, or sample it over a range.",
  inputSchema: {
    type: "object",
    required: ["expression"],
    properties: {
      expression: { type: "string", description: "Infix expression, e.g. sin(pi/2) + x^2." },
      mode: { type: "string", enum: [...MODES], description: "What to produce. Defaults to evaluate." },
      variables: { type: "object", description: "Numeric values for free variables." },
      randomize: { type: "boolean", description: "Bind unbound variables to random values." },
      variable: { type: "string", description: "Variable swept in sample mode. Defaults to x." },
      range: {
        type: "object",
        description: "Sample range { start, end, step }. Defaults to the engine config.",
      },
    },
  },
  async execute(input): Promise<ToolResult> {
    const parsed = validateInput(input);
    if ("ok" in parsed) {
      return parsed;
    }

    const start = Date.now();

    try {
      const { output, meta } = run(parsed);
      return {
        ok: true,
        output,
        meta: {
          expression: parsed.expression,
          mode: parsed.mode,
          durationMs: Date.now() - start,
          ...meta,
        },
      };
    } catch (err) {
      if (err instanceof CalcError) {
        if (isInternalError(err.code)) {
          devError(`Internal engine error for "${parsed.expression}":`, err.message);
        }
        return {
          ok: false,
          error: `${err.code}: ${describeError(err)}`,
          meta: {
            expression: parsed.expression,
            durationMs: Date.now() - start,
            errorCode: err.code,
            errorPos: err.pos,
          },
        };
      }
      const message = err instanceof Error ? err.message : "Unknown calculator error";
      devError(`Calculator failed for "${parsed.expression}":`, message);
      return {
        ok: false,
        error: message,
        meta: {
          expression: parsed.expression,
          durationMs: Date.now() - start,
        },
      };
    }
  },
};

const CALC_PROMPT_BLOCK = [
  "Calculator Skill is available.",
  "Use calculator for any numeric computation and for infix-to-postfix or prefix conversion.",
  "Operators: + - * / % // ^ ** with unary +/-. Constants: pi, e, j (imaginary unit).",
  "Functions: sqrt abs ln log log2 exp floor ceil round fact, sin..acsch, rad deg.",
  "Modes: evaluate (default), postfix, prefix, sample (sweeps a variable over a range).",
].join("\n");

const calculatorSkill: SkillDefinition = {
  id: "calculator",
  version: "1.0.0",
  description: "Infix expression engine with real and complex evaluation.",
  promptBlock: CALC_PROMPT_BLOCK,
  tools: [calculatorTool],
};

export default calculatorSkill;
