export type {
  ToolDefinition,
  ToolInputSchema,
  ToolParameterSchema,
  ToolResult,
} from './Tool';
export { defineTool, str, integer, boolean } from './Tool';
export { ACTION_CATALOG, findToolDefinition } from './ActionCatalog';
