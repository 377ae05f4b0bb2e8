import { Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  abortable,
  abortReason,
  ActionError,
  CuaError,
  CuaErrorCode,
  describeError,
  DesktopBackend,
  extractText,
  ImageContentBlock,
  isTextContentBlock,
  isThinkingContentBlock,
  isToolUseContentBlock,
  Message,
  MessageContentBlock,
  MessageContentType,
  Role,
  TaskError,
  textMessage,
  throwIfAborted,
  ToolUseContentBlock,
} from '@cua/shared';
import { CoordinateState, EncodeOptions } from '../coordinate-system';
import { MODEL_RATE_LIMIT_MESSAGE } from '../google/google.constants';
import { isModelRateLimitError } from '../google/google.service';
import { PhaseObservation, TaskMemory, TaskSummary } from '../memory';
import { Guardrails, TakeoverReason } from '../safety';
import {
  Escalation,
  failure,
  PreparedToolCall,
  ToolContext,
  ToolOutput,
  ToolRegistry,
} from '../tools';
import {
  AgentEvents,
  CONTINUE_PROMPT,
  MAX_IDLE_TURNS,
  SINGLE_TOOL_REMINDER,
} from './agent.constants';
import { buildSystemPrompt, renderSystemPrompt } from './agent.prompts';
import {
  ModelClient,
  ProgressCallback,
  Step,
  TaskResult,
} from './agent.types';

export interface AgentLoopSettings {
  maxActions: number;
  screenIndex: number;
  screenshot: EncodeOptions;
  /**
   * When set, queued takeovers, safety blocks and repeated failures go to
   * the takeover handler.
   */
  interactiveTakeover: boolean;
}

export interface AgentLoopDependencies {
  model: ModelClient;
  backend: DesktopBackend;
  guardrails: Guardrails;
  registry: ToolRegistry;
  coordinates: CoordinateState;
  events: EventEmitter2;
}

export interface RunOptions {
  signal: AbortSignal;
  onProgress?: ProgressCallback;
}

interface Termination {
  success: boolean;
  summary?: string;
  error?: Error;
  needsHelp: boolean;
}

interface RunState {
  task: string;
  memory: TaskMemory;
  messages: Message[];
  steps: Step[];
  idleTurns: number;
  lastText: string;
  escalation: Escalation | null;
  startedAt: number;
  signal: AbortSignal;
  onProgress?: ProgressCallback;
}

function errorCodeOf(output: ToolOutput): CuaErrorCode | undefined {
  return Object.values(CuaErrorCode).find((code) => code === output.code);
}

/**
 * The ReAct driver: asks the model for one action per turn, checks it with
 * the guardrails, runs it and feeds the observation back until the model
 * finishes or a terminal condition fires.
 */
export class AgentLoop {
  private readonly logger = new Logger(AgentLoop.name);

  constructor(
    private readonly deps: AgentLoopDependencies,
    private readonly settings: AgentLoopSettings,
  ) {}

  async run(task: string, { signal, onProgress }: RunOptions): Promise<TaskResult> {
    const state: RunState = {
      task,
      memory: new TaskMemory(task),
      messages: [textMessage(Role.User, task)],
      steps: [],
      idleTurns: 0,
      lastText: '',
      escalation: null,
      startedAt: Date.now(),
      signal,
      onProgress,
    };

    this.logger.log(`Starting task: ${task}`);
    this.deps.coordinates.reset();
    this.deps.guardrails.resetFailures();

    let termination: Termination;
    try {
      termination = await this.iterate(state);
    } catch (error) {
      termination = {
        success: false,
        error: signal.aborted
          ? abortReason(signal)
          : error instanceof Error
            ? error
            : new Error(String(error)),
        needsHelp: false,
      };
    }

    await this.deps.guardrails.auditLog.flush();
    return this.finish(state, termination);
  }

  private async iterate(state: RunState): Promise<Termination> {
    const template = buildSystemPrompt({ tools: this.deps.registry.list() });

    for (;;) {
      throwIfAborted(state.signal);

      const blocks = await this.requestStep(state, template);
      throwIfAborted(state.signal);

      const termination = await this.handleResponse(state, blocks);
      if (termination) {
        return termination;
      }
    }
  }

  private async requestStep(
    state: RunState,
    template: string,
  ): Promise<MessageContentBlock[]> {
    try {
      const response = await this.deps.model.generateMessage({
        systemPrompt: renderSystemPrompt(template, state.memory.toPrompt()),
        messages: state.messages,
        tools: this.deps.registry.list(),
        signal: state.signal,
      });
      this.logger.debug(
        `Model turn used ${response.tokenUsage.totalTokens} tokens`,
      );
      return response.contentBlocks;
    } catch (error) {
      if (!(error instanceof CuaError) && isModelRateLimitError(error)) {
        throw new CuaError(CuaErrorCode.RateLimited, MODEL_RATE_LIMIT_MESSAGE, {
          cause: error,
        });
      }
      throw error;
    }
  }

  private async handleResponse(
    state: RunState,
    blocks: MessageContentBlock[],
  ): Promise<Termination | null> {
    for (const block of blocks) {
      if (isThinkingContentBlock(block)) {
        this.deps.events.emit(AgentEvents.Thinking, { text: block.thinking });
      } else if (isTextContentBlock(block) && block.text.trim().length > 0) {
        this.deps.events.emit(AgentEvents.Content, { text: block.text });
      }
    }

    const text = extractText(blocks);
    const toolUses = blocks.filter(isToolUseContentBlock);

    if (toolUses.length === 0) {
      if (blocks.length > 0) {
        state.messages.push({ role: Role.Assistant, content: blocks });
      }
      if (text) {
        state.lastText = text;
        return {
          success: state.steps.length > 0 && !state.memory.isStuck(),
          summary: text,
          needsHelp: false,
        };
      }
      state.messages.push(textMessage(Role.User, CONTINUE_PROMPT));
      return this.idleTurn(state);
    }

    if (text) {
      state.lastText = text;
    }

    const [call] = toolUses;
    if (toolUses.length > 1) {
      this.logger.warn(
        `Model emitted ${toolUses.length} tool calls, running only ${call.name}`,
      );
    }
    state.messages.push({
      role: Role.Assistant,
      content: blocks.filter(
        (block) => !isToolUseContentBlock(block) || block === call,
      ),
    });

    return this.handleToolCall(state, call, text, toolUses.length > 1);
  }

  private idleTurn(state: RunState): Termination | null {
    state.idleTurns++;
    if (state.idleTurns < MAX_IDLE_TURNS) {
      return null;
    }
    return {
      success: false,
      error: new CuaError(
        CuaErrorCode.AgentStuck,
        `no executable action in ${MAX_IDLE_TURNS} consecutive turns`,
      ),
      needsHelp: true,
    };
  }

  private async handleToolCall(
    state: RunState,
    call: ToolUseContentBlock,
    text: string,
    droppedCalls: boolean,
  ): Promise<Termination | null> {
    const { guardrails, registry } = this.deps;

    const tool = registry.get(call.name);
    if (!tool) {
      this.logger.warn(`Model requested unknown tool: ${call.name}`);
      state.messages.push(
        this.observation(
          call,
          failure(
            `unknown tool: ${call.name}`,
            `Use one of: ${registry.names().join(', ')}`,
          ),
          false,
        ),
      );
      return this.idleTurn(state);
    }
    state.idleTurns = 0;

    if (state.steps.length >= this.settings.maxActions) {
      return {
        success: false,
        error: new CuaError(
          CuaErrorCode.MaxActions,
          `exceeded maximum actions (${this.settings.maxActions})`,
        ),
        needsHelp: false,
      };
    }

    const number = state.steps.length + 1;
    const prepared: PreparedToolCall = tool.prepare(call.input);
    const description = text || `${call.name} ${prepared.target}`.trim();

    this.deps.events.emit(AgentEvents.ToolCall, {
      step: number,
      name: call.name,
      input: call.input,
      target: prepared.target,
    });

    const startedAt = Date.now();
    const denial = guardrails.validateAction(
      call.name,
      prepared.target,
      description,
    );

    let output: ToolOutput;
    if (denial) {
      output = failure(denial.message, this.denialSuggestion(denial), {
        code: denial.code,
      });
    } else {
      output = await registry.execute(
        call.name,
        prepared,
        this.toolContext(state),
      );
    }
    const durationMs = Date.now() - startedAt;

    const step: Step = {
      number,
      action: call.name,
      description,
      target: prepared.target,
      success: output.success,
      durationMs,
    };
    if (!output.success) {
      const code = errorCodeOf(output);
      const cause =
        denial ??
        (code
          ? new CuaError(code, output.error)
          : new Error(output.error ?? 'action failed'));
      step.error = new ActionError(number, call.name, description, cause);
    }
    state.steps.push(step);

    this.remember(state, call, prepared.target, output, durationMs, denial);
    state.messages.push(
      this.observation(call, { ...output, duration_ms: durationMs }, droppedCalls),
    );
    this.reportStep(state, step);

    if (denial) {
      const termination = await this.handleDenial(state, denial);
      if (termination) {
        return termination;
      }
    } else if (state.escalation) {
      return this.escalationTermination(state.escalation);
    }

    // with a takeover handler the guardrails escalate on the next validation
    if (!this.settings.interactiveTakeover && state.memory.needsHelp()) {
      return {
        success: false,
        error: new CuaError(
          CuaErrorCode.AgentStuck,
          `agent stuck after ${state.memory.summary().consecutiveFails} consecutive failures`,
        ),
        needsHelp: true,
      };
    }

    return null;
  }

  private toolContext(state: RunState): ToolContext {
    return {
      backend: this.deps.backend,
      coordinates: this.deps.coordinates,
      memory: state.memory,
      screenIndex: this.settings.screenIndex,
      screenshot: this.settings.screenshot,
      signal: state.signal,
      escalate: (outcome) => {
        state.escalation = outcome;
      },
    };
  }

  private remember(
    state: RunState,
    call: ToolUseContentBlock,
    target: string,
    output: ToolOutput,
    durationMs: number,
    denial: CuaError | null,
  ): void {
    const { memory } = state;
    const { guardrails } = this.deps;
    const resultText = output.success
      ? (output.message ?? 'ok')
      : (output.error ?? 'action failed');

    memory.recordAction(call.name, call.input, output.success, resultText, durationMs);

    if (!output.success) {
      memory.addFailedPattern(`${call.name} ${target}`.trim());
    }

    if (output.success) {
      guardrails.recordSuccess(call.name, target, resultText);
    } else {
      guardrails.recordFailure(call.name, target, denial ?? resultText);
    }

    const observation = this.phaseObservation(call.name, output);
    if (observation) {
      memory.maybeUpdatePhase(observation);
    }
  }

  /** What find_element saw, as input for phase inference. */
  private phaseObservation(
    action: string,
    output: ToolOutput,
  ): PhaseObservation | null {
    if (action !== 'find_element' || !Array.isArray(output.elements)) {
      return null;
    }

    const names: string[] = [];
    const roles: string[] = [];
    let focusedRole: string | undefined;
    for (const element of output.elements) {
      if (typeof element !== 'object' || element === null) {
        continue;
      }
      const name: unknown = Reflect.get(element, 'name');
      const role: unknown = Reflect.get(element, 'role');
      if (typeof name === 'string' && name) {
        names.push(name);
      }
      if (typeof role === 'string') {
        roles.push(role.toLowerCase());
        if (Reflect.get(element, 'focused') === true) {
          focusedRole = role;
        }
      }
    }

    return {
      visibleText: names.join(' '),
      focusedRole,
      flags: {
        passwordField: roles.some((role) => role.includes('securetextfield')),
        searchField: roles.some((role) => role.includes('searchfield')),
        formFields: roles.filter((role) => role.includes('textfield')).length > 1,
      },
    };
  }

  private observation(
    call: ToolUseContentBlock,
    output: ToolOutput,
    droppedCalls: boolean,
  ): Message {
    const { image_base64: imageData, ...content } = output;
    const image: ImageContentBlock | undefined =
      typeof imageData === 'string'
        ? {
            type: MessageContentType.Image,
            source: { type: 'base64', media_type: 'image/jpeg', data: imageData },
          }
        : undefined;

    const blocks: MessageContentBlock[] = [
      {
        type: MessageContentType.ToolResult,
        tool_use_id: call.id,
        name: call.name,
        content,
        ...(image && { image }),
        ...(!output.success && { is_error: true }),
      },
    ];
    if (droppedCalls) {
      blocks.push({ type: MessageContentType.Text, text: SINGLE_TOOL_REMINDER });
    }

    return { role: Role.User, content: blocks };
  }

  private reportStep(state: RunState, step: Step): void {
    const mark = step.success ? '✓' : '✗';
    this.logger.log(
      `${mark} Step ${step.number}: ${step.action} ${step.target} (${step.durationMs}ms)`,
    );
    this.deps.events.emit(AgentEvents.Step, step);

    if (state.onProgress) {
      try {
        state.onProgress(step);
      } catch (error) {
        this.logger.warn(`Progress callback failed: ${describeError(error)}`);
      }
    }
  }

  private denialSuggestion(denial: CuaError): string | undefined {
    switch (denial.code) {
      case CuaErrorCode.SafetyBlock:
        return 'This action is blocked by the safety policy. Find another way or call need_help';
      case CuaErrorCode.RateLimited:
        return 'Too many actions in the last minute. The next action will wait for a free slot';
      default:
        return undefined;
    }
  }

  private async handleDenial(
    state: RunState,
    denial: CuaError,
  ): Promise<Termination | null> {
    switch (denial.code) {
      case CuaErrorCode.HumanTakeover:
        if (this.settings.interactiveTakeover) {
          return this.askHuman(state, TakeoverReason.Programmatic, denial);
        }
        this.deps.events.emit(AgentEvents.Takeover, {
          reason: TakeoverReason.Programmatic,
          message: denial.message,
        });
        return { success: false, error: denial, needsHelp: false };

      case CuaErrorCode.AgentStuck:
        if (this.settings.interactiveTakeover) {
          return this.askHuman(state, TakeoverReason.ConsecutiveFailures, denial);
        }
        return { success: false, error: denial, needsHelp: true };

      case CuaErrorCode.SafetyBlock:
        if (this.settings.interactiveTakeover) {
          return this.askHuman(state, TakeoverReason.SensitiveAction, denial);
        }
        return null;

      case CuaErrorCode.RateLimited: {
        const waited = await this.deps.guardrails.rateLimiter.wait(state.signal);
        this.logger.debug(`Waited ${waited}ms for a rate limit slot`);
        return null;
      }

      default:
        return null;
    }
  }

  /**
   * Hands the decision to the takeover handler. `abort` ends the run;
   * `resume` and `retry` clear the failure counter and the paused flag and
   * continue.
   */
  private async askHuman(
    state: RunState,
    reason: TakeoverReason,
    denial: CuaError,
  ): Promise<Termination | null> {
    const { guardrails, events } = this.deps;
    events.emit(AgentEvents.Takeover, { reason, message: denial.message });

    const response = await abortable(
      guardrails.takeover.request(reason, denial.message),
      state.signal,
    );
    this.logger.log(`Takeover answered with ${response}`);

    if (response === 'abort') {
      return {
        success: false,
        error:
          denial.code === CuaErrorCode.HumanTakeover
            ? denial
            : new CuaError(
                CuaErrorCode.HumanTakeover,
                `human takeover requested: ${denial.message}`,
                { cause: denial },
              ),
        needsHelp: false,
      };
    }

    guardrails.resetFailures();
    guardrails.resume();
    return null;
  }

  private escalationTermination(escalation: Escalation): Termination {
    if (escalation.kind === 'complete') {
      return { success: true, summary: escalation.summary, needsHelp: false };
    }

    const details = escalation.attemptsMade
      ? `${escalation.reason} (tried: ${escalation.attemptsMade})`
      : escalation.reason;
    return {
      success: false,
      summary: details,
      error: new CuaError(
        CuaErrorCode.AgentStuck,
        `agent requested help: ${escalation.reason}`,
      ),
      needsHelp: true,
    };
  }

  private finish(state: RunState, termination: Termination): TaskResult {
    const memory = state.memory.summary();
    const durationMs = Date.now() - state.startedAt;
    const summary =
      termination.summary || state.lastText || synthesizeSummary(memory, state.steps);

    const result: TaskResult = {
      success: termination.success,
      summary,
      steps: state.steps,
      durationMs,
      needsHelp: termination.needsHelp,
      memory,
    };

    if (termination.error) {
      const failed = state.steps.filter((step) => !step.success).length;
      const last = state.steps.at(-1);
      result.error = new TaskError(
        state.task,
        state.steps.length,
        failed,
        last ? last.action : '',
        termination.error,
      );
      this.logger.warn(result.error.message);
    }

    if (result.success) {
      this.logger.log(
        `Task finished in ${state.steps.length} steps (${durationMs}ms): ${summary}`,
      );
      this.deps.events.emit(AgentEvents.Completed, result);
    } else {
      if (!result.error) {
        this.logger.warn(`Task ended unsuccessfully: ${summary}`);
      }
      this.deps.events.emit(AgentEvents.Failed, result);
    }

    return result;
  }
}

/** Fallback summary when the model never produced text. */
export function synthesizeSummary(memory: TaskSummary, steps: Step[]): string {
  if (memory.milestones.length > 0) {
    return `Progress: ${memory.milestones.join('; ')}`;
  }
  if (steps.length === 0) {
    return 'No actions were taken';
  }
  const succeeded = steps.filter((step) => step.success).length;
  return `Performed ${steps.length} actions (${succeeded} succeeded), last: ${steps[steps.length - 1].action}`;
}
