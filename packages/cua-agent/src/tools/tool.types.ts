import { z } from 'zod';
import { DesktopBackend } from '@cua/shared';
import { CoordinateState, EncodeOptions } from '../coordinate-system';
import { TaskMemory } from '../memory';

export type JsonSchemaType =
  | 'object'
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'array';

/** The subset of JSON Schema used to describe tool parameters. */
export interface JsonSchema {
  type: JsonSchemaType;
  description?: string;
  enum?: string[];
  items?: JsonSchema;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  default?: unknown;
  minimum?: number;
  maximum?: number;
}

/**
 * JSON object returned to the model. Failures carry `error` and, where a
 * better approach exists, `suggestion`.
 */
export interface ToolOutput {
  success: boolean;
  message?: string;
  error?: string;
  suggestion?: string;
  [key: string]: unknown;
}

export type Escalation =
  | { kind: 'complete'; summary: string }
  | { kind: 'need_help'; reason: string; attemptsMade?: string };

export interface ToolContext {
  backend: DesktopBackend;
  coordinates: CoordinateState;
  memory: TaskMemory;
  screenIndex: number;
  screenshot: EncodeOptions;
  signal: AbortSignal;
  escalate(outcome: Escalation): void;
}

export interface ToolDefinition<TArgs> {
  name: string;
  description: string;
  input_schema: JsonSchema;
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  /** Salient arguments as shown in steps, audit entries and safety checks. */
  target(args: TArgs): string;
  execute(args: TArgs, context: ToolContext): Promise<ToolOutput>;
}

export type PreparedToolCall =
  | {
      valid: true;
      target: string;
      run(context: ToolContext): Promise<ToolOutput>;
    }
  | { valid: false; target: string; output: ToolOutput };

/** A tool with its argument type erased, as held by the registry. */
export interface AgentTool {
  name: string;
  description: string;
  input_schema: JsonSchema;
  prepare(input: Record<string, unknown>): PreparedToolCall;
}
