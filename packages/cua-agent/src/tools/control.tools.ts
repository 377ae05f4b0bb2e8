import { z } from 'zod';
import { delay } from '@cua/shared';
import { defineTool, failure, success } from './tool.helpers';

export const MIN_WAIT_MS = 1;
export const MAX_WAIT_MS = 30_000;

export const waitSchema = z.object({
  duration_ms: z.number(),
});

export const waitTool = defineTool({
  name: 'wait',
  description:
    'Waits before the next action, e.g. while an application launches or a page loads. Maximum 30000 milliseconds.',
  input_schema: {
    type: 'object',
    properties: {
      duration_ms: {
        type: 'integer',
        description: 'How long to wait in milliseconds (1-30000)',
        minimum: MIN_WAIT_MS,
        maximum: MAX_WAIT_MS,
      },
    },
    required: ['duration_ms'],
  },
  schema: waitSchema,
  target: (args) => `${args.duration_ms}ms`,
  async execute(args, context) {
    if (args.duration_ms < MIN_WAIT_MS) {
      return failure(
        'duration must be at least 1 millisecond',
        'Pass a duration_ms between 1 and 30000',
      );
    }
    if (args.duration_ms > MAX_WAIT_MS) {
      return failure(
        'duration cannot exceed 30000 milliseconds (30 seconds)',
        'Wait in several shorter steps and take a screenshot in between',
      );
    }

    const startedAt = Date.now();
    await delay(args.duration_ms, context.signal);
    return success(`Waited ${args.duration_ms}ms`, {
      waited_ms: Date.now() - startedAt,
    });
  },
});

export const completeTaskSchema = z.object({
  summary: z.string(),
});

export const completeTaskTool = defineTool({
  name: 'complete_task',
  description:
    'Call this once the task is fully done and verified with a screenshot. Ends the run successfully.',
  input_schema: {
    type: 'object',
    properties: {
      summary: {
        type: 'string',
        description: 'What was accomplished',
      },
    },
    required: ['summary'],
  },
  schema: completeTaskSchema,
  target: () => '',
  async execute(args, context) {
    context.escalate({ kind: 'complete', summary: args.summary });
    return success('Task marked as complete', { summary: args.summary });
  },
});

export const needHelpSchema = z.object({
  reason: z.string(),
  attempts_made: z.string().optional(),
});

export const needHelpTool = defineTool({
  name: 'need_help',
  description:
    'Call this when the task cannot be finished without a human, e.g. after repeated failures, a login you have no credentials for, or a CAPTCHA. Ends the run.',
  input_schema: {
    type: 'object',
    properties: {
      reason: {
        type: 'string',
        description: 'Why help is needed',
      },
      attempts_made: {
        type: 'string',
        description: 'What has been tried so far',
      },
    },
    required: ['reason'],
  },
  schema: needHelpSchema,
  target: () => '',
  async execute(args, context) {
    context.escalate({
      kind: 'need_help',
      reason: args.reason,
      attemptsMade: args.attempts_made,
    });
    return success('Help requested', { reason: args.reason });
  },
});
