// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Holds tools by name, checks required parameters and their types, and dispatches to handlers.
 */

import type {
  ModelTool,
  Tool,
  ToolDefinition,
  ToolParameterType,
  ToolResult,
  ToolRegistry,
} from './types.ts';

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, Tool>();

  function validateParameterType(
    value: unknown,
    expectedType: ToolParameterType,
  ): boolean {
    switch (expectedType) {
      case 'string':
        return typeof value === 'string';
      case 'number':
        return typeof value === 'number' && Number.isFinite(value);
      case 'integer':
        return typeof value === 'number' && Number.isInteger(value);
      case 'boolean':
        return typeof value === 'boolean';
      case 'object':
        return typeof value === 'object' && value !== null && !Array.isArray(value);
      case 'array':
        return Array.isArray(value);
      default:
        return false;
    }
  }

  function describeValue(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    if (typeof value === 'number' && !Number.isInteger(value)) return 'non-integer number';
    return typeof value;
  }

  return {
    register(tool: Tool): void {
      if (tools.has(tool.definition.name)) {
        throw new Error(
          `tool already registered: ${tool.definition.name}`,
        );
      }
      tools.set(tool.definition.name, tool);
    },

    getDefinitions(): Array<ToolDefinition> {
      return Array.from(tools.values()).map((tool) => tool.definition);
    },

    async dispatch(
      name: string,
      params: Record<string, unknown>,
    ): Promise<ToolResult> {
      const tool = tools.get(name);
      if (!tool) {
        return {
          success: false,
          output: '',
          error: `unknown tool: ${name}`,
        };
      }

      for (const param of tool.definition.parameters) {
        if (param.required && !(param.name in params)) {
          return {
            success: false,
            output: '',
            error: `missing required parameter: ${param.name}`,
          };
        }
      }

      for (const param of tool.definition.parameters) {
        if (param.name in params) {
          const value = params[param.name];
          if (!validateParameterType(value, param.type)) {
            return {
              success: false,
              output: '',
              error: `invalid type for parameter ${param.name}: expected ${param.type}, got ${describeValue(value)}`,
            };
          }
          if (param.enum_values && !param.enum_values.includes(String(value))) {
            return {
              success: false,
              output: '',
              error: `invalid value for parameter ${param.name}: expected one of ${param.enum_values.join(', ')}`,
            };
          }
        }
      }

      try {
        return await tool.handler(params);
      } catch (error) {
        return {
          success: false,
          output: '',
          error: `handler error: ${error instanceof Error ? error.message : String(error)}`,
        };
      }
    },

    toModelTools(): Array<ModelTool> {
      return Array.from(tools.values()).map((tool) => {
        const properties: Record<string, unknown> = {};
        const required: Array<string> = [];

        for (const param of tool.definition.parameters) {
          properties[param.name] = {
            type: param.type,
            description: param.description,
            ...(param.enum_values && { enum: param.enum_values }),
          };

          if (param.required) {
            required.push(param.name);
          }
        }

        return {
          name: tool.definition.name,
          description: tool.definition.description,
          input_schema: {
            type: 'object',
            properties,
            required,
          },
        };
      });
    },
  };
}
