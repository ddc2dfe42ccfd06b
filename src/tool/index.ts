// pattern: Functional Core

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  ToolResult,
  ToolHandler,
  Tool,
  ModelTool,
  ToolRegistry,
} from './types.ts';

export { createToolRegistry } from './registry.ts';
export {
  createSearchTool,
  handleSearchRequest,
  parseSearchRequest,
  type SearchFn,
  type SearchToolOptions,
} from './builtin/search.ts';
