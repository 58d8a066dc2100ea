/**
 * JSON schema of one tool parameter.
 */
export interface ToolParameterSchema {
  type: 'string' | 'integer' | 'number' | 'boolean';
  description: string;
  enum?: readonly string[];
}

/**
 * JSON schema of a tool's input object, in the shape function-calling APIs expect.
 */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, ToolParameterSchema>;
  required: string[];
}

/**
 * Tool definition for LLM function calling.
 */
export interface ToolDefinition {
  /** Unique name of the tool */
  name: string;
  /** Description of what the tool does */
  description: string;
  parameters: ToolInputSchema;
}

/**
 * Result returned by a toolbox invocation.
 */
export interface ToolResult {
  success: boolean;
  /** Text recorded in history on success */
  observation: string;
  /** Error message if execution failed */
  error?: string;
  /** Selector the call used, if any */
  selector?: string;
  /** Execution duration in milliseconds */
  duration: number;
  toolName: string;
}

export function str(description: string): ToolParameterSchema {
  return { type: 'string', description };
}

export function integer(description: string): ToolParameterSchema {
  return { type: 'integer', description };
}

export function boolean(description: string): ToolParameterSchema {
  return { type: 'boolean', description };
}

/**
 * Builds a tool definition. `required` is always an array, which some
 * function-calling APIs insist on.
 */
export function defineTool(
  name: string,
  description: string,
  properties: Record<string, ToolParameterSchema>,
  required: string[] = []
): ToolDefinition {
  return { name, description, parameters: { type: 'object', properties, required } };
}
