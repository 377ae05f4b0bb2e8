import { FunctionDeclaration, Schema, Type } from '@google/genai';
import { AgentTool, JsonSchema, JsonSchemaType } from '../tools/tool.types';

const GOOGLE_TYPES: Record<JsonSchemaType, Type> = {
  string: Type.STRING,
  number: Type.NUMBER,
  integer: Type.INTEGER,
  boolean: Type.BOOLEAN,
  array: Type.ARRAY,
  object: Type.OBJECT,
};

/**
 * Converts a tool parameter schema to the Gemini schema dialect.
 */
export function toGoogleSchema(schema: JsonSchema): Schema {
  const result: Schema = { type: GOOGLE_TYPES[schema.type] };

  if (schema.description) {
    result.description = schema.description;
  }

  // Gemini rejects enums on anything but strings
  if (schema.type === 'string' && schema.enum) {
    result.enum = [...schema.enum];
  }

  if (schema.type === 'number' || schema.type === 'integer') {
    if (schema.minimum !== undefined) {
      result.minimum = schema.minimum;
    }
    if (schema.maximum !== undefined) {
      result.maximum = schema.maximum;
    }
  }

  if (schema.type === 'array' && schema.items) {
    result.items = toGoogleSchema(schema.items);
  }

  if (schema.type === 'object' && schema.properties) {
    result.properties = Object.fromEntries(
      Object.entries(schema.properties).map(([key, value]) => [
        key,
        toGoogleSchema(value),
      ]),
    );
    if (schema.required && schema.required.length > 0) {
      result.required = [...schema.required];
    }
  }

  return result;
}

export function toFunctionDeclaration(tool: AgentTool): FunctionDeclaration {
  const hasParameters =
    tool.input_schema.properties !== undefined &&
    Object.keys(tool.input_schema.properties).length > 0;

  return hasParameters
    ? {
        name: tool.name,
        description: tool.description,
        parameters: toGoogleSchema(tool.input_schema),
      }
    : { name: tool.name, description: tool.description };
}

export function toGoogleTools(tools: readonly AgentTool[]): FunctionDeclaration[] {
  return tools.map(toFunctionDeclaration);
}
