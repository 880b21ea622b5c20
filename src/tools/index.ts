export { getTools, getToolSpec, getToolSpecs, isToolExposed, TOOL_SPECS } from './registry.js';
export type { ToolExposure, ToolExposureMode, ToolHandlerContext, ToolSpec } from './registry.js';
export { handleToolCall } from './dispatcher.js';
export type { ToolCallContext, ToolResponse } from './dispatcher.js';
