export * from "./engine/index.js";
export {
  getEngineConfig,
  loadEngineConfig,
  buildConfigFromEnv,
  isEngineConfig,
  CONFIG_PATH,
  type EngineConfig,
  type SamplingDefaults,
  type RandomDefaults,
} from "./config/engine-config.js";
export { calculatorTool, default as calculatorSkill } from "./skills/builtins/calculator/index.js";
export type { SkillDefinition, ToolDefinition, ToolResult } from "./skills/types.js";
