import { z } from 'zod';
import { AgentTool, ToolDefinition, ToolOutput } from './tool.types';

export function success(
  message: string,
  data: Record<string, unknown> = {},
): ToolOutput {
  return { ...data, success: true, message };
}

export function failure(
  error: string,
  suggestion?: string,
  data: Record<string, unknown> = {},
): ToolOutput {
  return suggestion
    ? { ...data, success: false, error, suggestion }
    : { ...data, success: false, error };
}

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

export function formatPoint(x: number, y: number): string {
  return `(${x}, ${y})`;
}

/**
 * Binds a tool's schema to its handler so the registry can hold tools of
 * different argument types.
 */
export function defineTool<TArgs>(definition: ToolDefinition<TArgs>): AgentTool {
  return {
    name: definition.name,
    description: definition.description,
    input_schema: definition.input_schema,
    prepare(input) {
      const parsed = definition.schema.safeParse(input);
      if (!parsed.success) {
        return {
          valid: false,
          target: '',
          output: failure(
            `invalid arguments: ${formatZodError(parsed.error)}`,
            `Check the ${definition.name} parameter schema and try again`,
          ),
        };
      }

      const args = parsed.data;
      return {
        valid: true,
        target: definition.target(args),
        run: (context) => definition.execute(args, context),
      };
    },
  };
}
