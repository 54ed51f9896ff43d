// Types
export type {
  ToolCall,
  ToolCategory,
  ToolContent,
  ToolContext,
  ToolDefinition,
  ToolFailure,
  ToolProfile,
  ToolResult,
  ToolSpec,
  ToolSuccess,
  JsonSchema,
  JsonSchemaProperty,
} from './types.js';

// Errors
export type { ToolErrorKind } from './errors.js';
export { ToolError, PathEscapeError, isToolError, toToolError } from './errors.js';

// Tool registry
export { ToolRegistry, isToolProfile } from './registry.js';

// Executor
export { ToolExecutor, findSandboxBypass } from './executor.js';
export type { ToolExecutorOptions, ExecuteOptions, SessionToolContext } from './executor.js';

// Tool catalog
export { fileTools } from './dev/file-tools.js';
export { bashTools, formatCommandOutput } from './dev/bash-tools.js';
export { browserTools, BROWSER_TOOL_PREFIX, flattenContent } from './browser/browser-tools.js';

// Schema utilities
export { zodToJsonSchema } from './schema-converter.js';
export { defineTool } from './define-tool.js';
