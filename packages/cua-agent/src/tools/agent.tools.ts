import { Logger } from '@nestjs/common';
import {
  abortReason,
  CuaErrorCode,
  describeError,
  findCuaError,
} from '@cua/shared';
import { completeTaskTool, needHelpTool, waitTool } from './control.tools';
import {
  clickTool,
  dragTool,
  keyPressTool,
  moveTool,
  scrollTool,
  typeTextTool,
} from './input.tools';
import { findElementTool, screenInfoTool, screenshotTool } from './screen.tools';
import { failure } from './tool.helpers';
import { AgentTool, PreparedToolCall, ToolContext, ToolOutput } from './tool.types';

export const AGENT_TOOLS: readonly AgentTool[] = [
  screenshotTool,
  screenInfoTool,
  clickTool,
  moveTool,
  dragTool,
  scrollTool,
  typeTextTool,
  keyPressTool,
  waitTool,
  findElementTool,
  completeTaskTool,
  needHelpTool,
];

/** Errors that end the run instead of being reported back to the model. */
const PROPAGATED_CODES: readonly CuaErrorCode[] = [
  CuaErrorCode.Canceled,
  CuaErrorCode.Timeout,
  CuaErrorCode.PermissionDenied,
];

const SUGGESTIONS: Partial<Record<CuaErrorCode, string>> = {
  [CuaErrorCode.InvalidDisplay]: 'Call screen_info to list the available displays',
  [CuaErrorCode.InvalidRect]: 'Region width and height must be positive',
  [CuaErrorCode.CaptureFailed]: 'Wait briefly and take the screenshot again',
  [CuaErrorCode.NotSupported]: 'Take a screenshot and work from the image instead',
  [CuaErrorCode.ElementNotFound]:
    'Take a screenshot and locate the element visually',
};

export class ToolRegistry {
  private readonly logger = new Logger(ToolRegistry.name);
  private readonly tools = new Map<string, AgentTool>();

  constructor(tools: readonly AgentTool[] = AGENT_TOOLS) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Duplicate tool name: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  get(name: string): AgentTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): AgentTool[] {
    return [...this.tools.values()];
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /**
   * Runs a prepared call. Failures become observations for the model,
   * except cancellation, timeout and missing OS permissions, which are
   * rethrown.
   */
  async execute(
    name: string,
    call: PreparedToolCall,
    context: ToolContext,
  ): Promise<ToolOutput> {
    if (!call.valid) {
      this.logger.warn(`[${name}] ${call.output.error ?? 'invalid arguments'}`);
      return call.output;
    }

    this.logger.debug(`Handling tool call: ${name} ${call.target}`);
    try {
      return await call.run(context);
    } catch (error) {
      if (context.signal.aborted) {
        throw abortReason(context.signal);
      }

      const cuaError = findCuaError(error);
      if (cuaError && PROPAGATED_CODES.includes(cuaError.code)) {
        throw error;
      }

      this.logger.error(
        `[${name}] failed: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );

      if (cuaError) {
        return failure(describeError(error), SUGGESTIONS[cuaError.code], {
          code: cuaError.code,
        });
      }
      return failure(describeError(error));
    }
  }
}
