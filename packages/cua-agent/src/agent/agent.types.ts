import { Message, MessageContentBlock } from '@cua/shared';
import { TaskSummary } from '../memory';
import { AgentTool } from '../tools';

export interface ModelResponse {
  contentBlocks: MessageContentBlock[];
  tokenUsage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
}

export interface ModelRequest {
  systemPrompt: string;
  messages: Message[];
  tools: readonly AgentTool[];
  signal?: AbortSignal;
}

/**
 * A function-calling chat model with image input. Implementations reject
 * with a `canceled` error when the signal aborts.
 */
export interface ModelClient {
  readonly modelName: string;
  generateMessage(request: ModelRequest): Promise<ModelResponse>;
}

export interface Step {
  /** 1-based, contiguous within a run. */
  number: number;
  action: string;
  description: string;
  target: string;
  success: boolean;
  durationMs: number;
  error?: Error;
}

export interface TaskResult {
  success: boolean;
  summary: string;
  steps: Step[];
  durationMs: number;
  error?: Error;
  /** The run ended because the model or the failure policy asked for help. */
  needsHelp: boolean;
  memory: TaskSummary;
}

export type ProgressCallback = (step: Step) => void;
