// pattern: Functional Core

/**
 * Tool system types for registration and dispatch.
 * A ToolDefinition is the capability descriptor handed to the agent runtime; validation of the
 * actual request happens in the handler.
 */

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array';

export type ToolParameter = {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum_values?: ReadonlyArray<string>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ReadonlyArray<ToolParameter>;
};

export type ToolResult = {
  success: boolean;
  output: string;
  error?: string;
};

export type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResult>;

export type Tool = {
  definition: ToolDefinition;
  handler: ToolHandler;
};

export type ModelTool = {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
};

export interface ToolRegistry {
  register(tool: Tool): void;
  getDefinitions(): Array<ToolDefinition>;
  dispatch(name: string, params: Record<string, unknown>): Promise<ToolResult>;
  toModelTools(): Array<ModelTool>;
}
