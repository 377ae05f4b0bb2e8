import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { abortable, CuaError, CuaErrorCode, DesktopBackend } from '@cua/shared';
import { AgentLoop } from './agent/agent.loop';
import { ModelClient, ProgressCallback, TaskResult } from './agent/agent.types';
import {
  AgentCollaborators,
  AgentConfig,
  AgentOptions,
  parseAgentOptions,
  redactConfig,
} from './config/agent.options';
import { CoordinateState } from './coordinate-system';
import { GoogleModelClient } from './google/google.service';
import { setLogVerbosity } from './logger/winston-logger';
import { AuditEntry, Guardrails, TakeoverController } from './safety';
import { ToolRegistry } from './tools';

export interface AgentDependencies {
  configService?: ConfigService;
  events?: EventEmitter2;
}

export interface RunContext {
  /** Cancels the task when aborted, in addition to `stop()` and the timeout. */
  signal?: AbortSignal;
}

interface AgentRuntime {
  loop: AgentLoop;
  guardrails: Guardrails;
}

/**
 * Runs natural-language tasks on the desktop, one at a time. The model
 * client, desktop backend and guardrails are created on the first task.
 */
export class Agent {
  private readonly logger = new Logger(Agent.name);
  private readonly settings: AgentConfig;
  private readonly collaborators: AgentCollaborators;
  readonly events: EventEmitter2;

  private isProcessing = false;
  private abortController: AbortController | null = null;
  private runtime: Promise<AgentRuntime> | null = null;
  private guardrails: Guardrails | null = null;
  private queuedTakeover: string | null = null;

  constructor(options: AgentOptions = {}, dependencies: AgentDependencies = {}) {
    const { config, collaborators } = parseAgentOptions(
      options,
      dependencies.configService,
    );
    if (!config.apiKey && !collaborators.modelClient) {
      throw new CuaError(CuaErrorCode.NoApiKey);
    }

    this.settings = config;
    this.collaborators = collaborators;
    this.events = dependencies.events ?? new EventEmitter2();

    if (config.verbose) {
      setLogVerbosity(true);
    }
  }

  do(task: string, context: RunContext = {}): Promise<TaskResult> {
    return this.execute(task, undefined, context.signal);
  }

  doWithProgress(
    task: string,
    onProgress: ProgressCallback,
    context: RunContext = {},
  ): Promise<TaskResult> {
    return this.execute(task, onProgress, context.signal);
  }

  /** Cancels the running task. Does nothing when idle. */
  stop(): void {
    if (!this.abortController) {
      return;
    }
    this.logger.log('Stopping current task');
    this.abortController.abort(new CuaError(CuaErrorCode.Canceled));
  }

  isRunning(): boolean {
    return this.isProcessing;
  }

  config(): AgentConfig {
    return redactConfig(this.settings);
  }

  /**
   * Pauses the agent before its next action. With an interactive `onTakeover`
   * handler the handler decides whether the task continues; otherwise the
   * running task ends with `human_takeover` and {@link resume} must be called
   * before starting another.
   */
  requestTakeover(message = ''): void {
    if (this.guardrails) {
      this.guardrails.requestTakeover(message);
      return;
    }
    this.queuedTakeover = message;
  }

  resume(): void {
    this.queuedTakeover = null;
    this.guardrails?.resume();
  }

  getAuditEntries(): AuditEntry[] {
    return this.guardrails?.getAuditEntries() ?? [];
  }

  private async execute(
    task: string,
    onProgress: ProgressCallback | undefined,
    signal: AbortSignal | undefined,
  ): Promise<TaskResult> {
    if (this.isProcessing) {
      this.logger.warn('Agent is already processing another task');
      throw new CuaError(CuaErrorCode.AgentBusy);
    }

    this.isProcessing = true;
    const controller = new AbortController();
    this.abortController = controller;

    const timeoutMs = this.settings.timeoutMs;
    const timer = setTimeout(
      () =>
        controller.abort(
          new CuaError(CuaErrorCode.Timeout, `task timed out after ${timeoutMs}ms`),
        ),
      timeoutMs,
    );
    const onCallerAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      onCallerAbort();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      const { loop } = await abortable(this.initialize(), controller.signal);
      return await loop.run(task, { signal: controller.signal, onProgress });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onCallerAbort);
      this.abortController = null;
      this.isProcessing = false;
    }
  }

  /** Runs once; a failure is cached and returned to every later task. */
  private initialize(): Promise<AgentRuntime> {
    if (!this.runtime) {
      this.runtime = this.createRuntime();
    }
    return this.runtime;
  }

  private async createRuntime(): Promise<AgentRuntime> {
    const { settings, collaborators } = this;

    const model = collaborators.modelClient ?? this.createModelClient();
    const backend = collaborators.backend ?? (await loadDesktopBackend());

    const guardrails = new Guardrails(
      {
        level: settings.safetyLevel,
        maxActionsPerMinute: settings.rateLimitPerMinute,
        maxConsecutiveFailures: settings.maxConsecutiveFailures,
        auditLogPath: settings.auditLogPath,
      },
      { takeover: new TakeoverController(collaborators.onTakeover) },
    );
    if (this.queuedTakeover !== null) {
      guardrails.requestTakeover(this.queuedTakeover);
      this.queuedTakeover = null;
    }
    this.guardrails = guardrails;

    const loop = new AgentLoop(
      {
        model,
        backend,
        guardrails,
        registry: new ToolRegistry(),
        coordinates: new CoordinateState(),
        events: this.events,
      },
      {
        maxActions: settings.maxActions,
        screenIndex: settings.screenIndex,
        screenshot: {
          maxDimension: settings.maxScreenshotDim,
          quality: settings.jpegQuality,
        },
        interactiveTakeover:
          !settings.headless && collaborators.onTakeover !== undefined,
      },
    );

    this.logger.log(
      `Agent ready (model ${model.modelName}, safety ${settings.safetyLevel})`,
    );
    return { loop, guardrails };
  }

  private createModelClient(): ModelClient {
    const { apiKey, model, thinkingBudget } = this.settings;
    if (!apiKey) {
      throw new CuaError(CuaErrorCode.NoApiKey);
    }
    return new GoogleModelClient({ apiKey, model, thinkingBudget });
  }
}

/** Imports the native backend on demand. */
export async function loadDesktopBackend(): Promise<DesktopBackend> {
  const desktop = await import('@cua/desktop');
  return desktop.createDesktopBackend();
}

export function createAgent(
  options: AgentOptions = {},
  dependencies: AgentDependencies = {},
): Agent {
  return new Agent(options, dependencies);
}
