export const DEFAULT_MAX_ACTIONS = 50;

/** Consecutive model turns without an executable action before giving up. */
export const MAX_IDLE_TURNS = 5;

export const TASK_CONTEXT_PLACEHOLDER = '{task_context}';

export const AgentEvents = {
  Thinking: 'agent.thinking',
  Content: 'agent.content',
  ToolCall: 'agent.tool_call',
  Step: 'agent.step',
  Takeover: 'agent.takeover',
  Completed: 'agent.completed',
  Failed: 'agent.failed',
} as const;

export type AgentEventName = (typeof AgentEvents)[keyof typeof AgentEvents];

export const CONTINUE_PROMPT =
  'No tool was called. Continue the task by calling exactly one tool, or call complete_task once it is done.';

export const SINGLE_TOOL_REMINDER =
  'Only the first tool call was executed. Call one tool per turn.';
