/**
 * Tool System Type Definitions
 *
 * Shape of the tools a host agent runtime registers.
 */

import { z } from 'zod';

export interface ToolContext {
  /** Host session, echoed in debug output */
  sessionId?: string;
}

export interface ToolResultMetadata {
  title?: string; // Short title, e.g., "LoadSkill(api-testing)"
  subtitle?: string; // Subtitle, e.g., the skill description
  size?: number; // Output size in characters
}

export interface ToolResult {
  success: boolean;
  output: string;
  error?: string;
  metadata?: ToolResultMetadata;
}

export interface Tool<TInput = unknown> {
  name: string;
  description: string;
  parameters: z.ZodType<TInput>;
  execute(input: TInput, context: ToolContext): Promise<ToolResult>;
}

/**
 * Tool definition as sent to a model: name, description, JSON schema
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export function toToolDefinition(tool: Tool): ToolDefinition {
  return {
    name: tool.name,
    description: tool.description,
    parameters: z.toJSONSchema(tool.parameters),
  };
}
