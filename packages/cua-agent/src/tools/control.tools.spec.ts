import { CuaErrorCode, isCuaError } from '@cua/shared';
import { createTestToolContext } from '../testing/tool-context';
import { completeTaskTool, needHelpTool, waitTool } from './control.tools';
import { AgentTool, ToolContext, ToolOutput } from './tool.types';

async function run(
  tool: AgentTool,
  input: Record<string, unknown>,
  context: ToolContext,
): Promise<ToolOutput> {
  const call = tool.prepare(input);
  if (!call.valid) {
    return call.output;
  }
  return call.run(context);
}

describe('wait tool', () => {
  it('rejects durations below one millisecond', async () => {
    const output = await run(waitTool, { duration_ms: 0 }, createTestToolContext());
    expect(output.success).toBe(false);
    expect(output.error).toBe('duration must be at least 1 millisecond');
  });

  it('rejects durations above thirty seconds', async () => {
    const output = await run(
      waitTool,
      { duration_ms: 30001 },
      createTestToolContext(),
    );
    expect(output.error).toBe(
      'duration cannot exceed 30000 milliseconds (30 seconds)',
    );
  });

  it('sleeps and reports the elapsed time', async () => {
    const output = await run(waitTool, { duration_ms: 20 }, createTestToolContext());

    expect(output.success).toBe(true);
    expect(output.message).toBe('Waited 20ms');
    expect(typeof output.waited_ms).toBe('number');
  });

  it('stops early when canceled', async () => {
    const controller = new AbortController();
    const context = createTestToolContext({ signal: controller.signal });
    const startedAt = Date.now();

    const pending = run(waitTool, { duration_ms: 5000 }, context);
    setTimeout(() => controller.abort(), 20);

    const error = await pending.then(
      () => null,
      (reason: unknown) => reason,
    );
    expect(isCuaError(error, CuaErrorCode.Canceled)).toBe(true);
    expect(Date.now() - startedAt).toBeLessThan(1000);
  });
});

describe('complete_task tool', () => {
  it('escalates with the summary', async () => {
    const context = createTestToolContext();

    const output = await run(
      completeTaskTool,
      { summary: 'Opened calculator' },
      context,
    );

    expect(output).toEqual({
      success: true,
      message: 'Task marked as complete',
      summary: 'Opened calculator',
    });
    expect(context.escalations).toEqual([
      { kind: 'complete', summary: 'Opened calculator' },
    ]);
  });

  it('requires a summary', () => {
    expect(completeTaskTool.prepare({}).valid).toBe(false);
  });
});

describe('need_help tool', () => {
  it('escalates with the reason and attempts', async () => {
    const context = createTestToolContext();

    await run(
      needHelpTool,
      { reason: 'CAPTCHA shown', attempts_made: 'reloaded twice' },
      context,
    );

    expect(context.escalations).toEqual([
      { kind: 'need_help', reason: 'CAPTCHA shown', attemptsMade: 'reloaded twice' },
    ]);
  });
});
