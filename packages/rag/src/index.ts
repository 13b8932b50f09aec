export {
  REFUSAL,
  buildAnswerMessages,
  buildToolAnswerMessages,
  formatContext,
  formatHistory,
} from "./prompts.js";
export {
  TOOL_NAMES,
  dispatchTool,
  formatToolResults,
  isToolName,
  toolSpecs,
  validateToolRegistry,
} from "./tools.js";
export type { ToolContext, ToolDefinition, ToolName, ToolOutcome } from "./tools.js";
export { MAX_K, RagService } from "./ragService.js";
export type { RagServiceOptions, RagStats } from "./ragService.js";
