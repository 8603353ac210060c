import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { devLog, devWarn, readJsonAs } from "../shared/index.js";

// ── Types ──────────────────────────────────────────────────────────

export interface SamplingDefaults {
  start: number;
  end: number;
  step: number;
}

export interface RandomDefaults {
  min: number;
  max: number;
}

export interface EngineConfig {
  displayPrecision: number;
  sampling: SamplingDefaults;
  random: RandomDefaults;
}

// ── Defaults ───────────────────────────────────────────────────────

const DEFAULT_CONFIG: EngineConfig = {
  displayPrecision: 15,
  sampling: { start: 0, end: 1, step: 0.01 },
  random: { min: -10, max: 10 },
};

/** A double carries at most 17 significant digits. */
const PRECISION_CAP = 17;

// ── Config file path ───────────────────────────────────────────────

const thisDir = dirname(fileURLToPath(import.meta.url));
export const CONFIG_PATH = resolve(thisDir, "..", "..", "context", "engine-config.json");

// ── Singleton state ────────────────────────────────────────────────

let currentConfig: EngineConfig = cloneDefaults();

function cloneDefaults(): EngineConfig {
  return {
    displayPrecision: DEFAULT_CONFIG.displayPrecision,
    sampling: { ...DEFAULT_CONFIG.sampling },
    random: { ...DEFAULT_CONFIG.random },
  };
}

// ── Env-var parsing helpers ────────────────────────────────────────

function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim().length === 0) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function parsePrecision(raw: string | undefined, fallback: number): number {
  const n = parseNumber(raw, fallback);
  return Number.isInteger(n) && n >= 1 ? Math.min(n, PRECISION_CAP) : fallback;
}

// ── Env-var fallback ───────────────────────────────────────────────

export function buildConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const step = parseNumber(env["CALC_SAMPLE_STEP"], DEFAULT_CONFIG.sampling.step);
  return {
    displayPrecision: parsePrecision(env["CALC_DISPLAY_PRECISION"], DEFAULT_CONFIG.displayPrecision),
    sampling: {
      start: parseNumber(env["CALC_SAMPLE_START"], DEFAULT_CONFIG.sampling.start),
      end: parseNumber(env["CALC_SAMPLE_END"], DEFAULT_CONFIG.sampling.end),
      step: step > 0 ? step : DEFAULT_CONFIG.sampling.step,
    },
    random: {
      min: parseNumber(env["CALC_RANDOM_MIN"], DEFAULT_CONFIG.random.min),
      max: parseNumber(env["CALC_RANDOM_MAX"], DEFAULT_CONFIG.random.max),
    },
  };
}

// ── Type guard ─────────────────────────────────────────────────────

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isEngineConfig(value: unknown): value is EngineConfig {
  if (!isRecord(value)) return false;

  const precision = value["displayPrecision"];
  if (!isFiniteNumber(precision) || !Number.isInteger(precision) || precision < 1 || precision > PRECISION_CAP) {
    return false;
  }

  const sampling = value["sampling"];
  if (!isRecord(sampling)) return false;
  const start = sampling["start"];
  const end = sampling["end"];
  const step = sampling["step"];
  if (!isFiniteNumber(start) || !isFiniteNumber(end) || !isFiniteNumber(step)) return false;
  if (step <= 0 || end < start) return false;

  const random = value["random"];
  if (!isRecord(random)) return false;
  const min = random["min"];
  const max = random["max"];
  return isFiniteNumber(min) && isFiniteNumber(max) && min <= max;
}

// ── Public getters ─────────────────────────────────────────────────

export function getEngineConfig(): Readonly<EngineConfig> {
  return currentConfig;
}

// ── Loader ─────────────────────────────────────────────────────────

export async function loadEngineConfig(path: string = CONFIG_PATH): Promise<EngineConfig> {
  const result = await readJsonAs(path, isEngineConfig);

  if (result.status !== "ok") {
    const problem =
      result.status === "missing" ? "not found" : result.reason === "syntax" ? "is not valid JSON" : "has invalid shape";
    devWarn(`engine-config.json ${problem}, falling back to env vars.`);
    currentConfig = buildConfigFromEnv();
    return currentConfig;
  }

  const { value } = result;
  currentConfig = {
    displayPrecision: value.displayPrecision,
    sampling: { start: value.sampling.start, end: value.sampling.end, step: value.sampling.step },
    random: { min: value.random.min, max: value.random.max },
  };
  devLog("Loaded engine config from engine-config.json");
  return currentConfig;
}

// ── Testing helpers ────────────────────────────────────────────────

export function _setConfigForTesting(config: EngineConfig): void {
  currentConfig = config;
}

export function _resetConfigToDefault(): void {
  currentConfig = cloneDefaults();
}
