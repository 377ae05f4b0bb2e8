import { Logger } from '@nestjs/common';
import { CuaError, CuaErrorCode, SafetyError } from '@cua/shared';
import { AuditEntry, AuditLog } from './audit-log';
import { DEFAULT_ACTIONS_PER_MINUTE, RateLimiter } from './rate-limiter';
import { SensitiveDetector, SensitiveLevel } from './sensitive-detector';
import { TakeoverController, TakeoverReason } from './takeover.controller';

export type SafetyLevel = 'minimal' | 'normal' | 'strict';

const LEVEL_RANK: Record<SafetyLevel, number> = {
  minimal: 0,
  normal: 1,
  strict: 2,
};

const SENSITIVE_LEVEL_NAMES: Record<SensitiveLevel, string> = {
  [SensitiveLevel.Warning]: 'warning',
  [SensitiveLevel.Confirm]: 'confirm',
  [SensitiveLevel.Block]: 'block',
};

export interface GuardrailsConfig {
  level: SafetyLevel;
  maxActionsPerMinute: number;
  maxConsecutiveFailures: number;
  auditLogPath?: string;
}

export const DEFAULT_GUARDRAILS_CONFIG: GuardrailsConfig = {
  level: 'normal',
  maxActionsPerMinute: DEFAULT_ACTIONS_PER_MINUTE,
  maxConsecutiveFailures: 5,
};

export interface GuardrailsDependencies {
  rateLimiter?: RateLimiter;
  sensitiveDetector?: SensitiveDetector;
  auditLog?: AuditLog;
  takeover?: TakeoverController;
}

/**
 * Pre-action checks and post-action bookkeeping for one agent. Checks run
 * in a fixed order: pending takeover, paused, consecutive failures, rate
 * limit, sensitive patterns.
 */
export class Guardrails {
  private readonly logger = new Logger(Guardrails.name);
  private config: GuardrailsConfig;
  private consecutiveFailures = 0;
  private paused = false;

  readonly rateLimiter: RateLimiter;
  readonly sensitiveDetector: SensitiveDetector;
  readonly auditLog: AuditLog;
  readonly takeover: TakeoverController;

  constructor(
    config: Partial<GuardrailsConfig> = {},
    dependencies: GuardrailsDependencies = {},
  ) {
    this.config = { ...DEFAULT_GUARDRAILS_CONFIG, ...config };
    if (this.config.maxConsecutiveFailures <= 0) {
      this.config.maxConsecutiveFailures =
        DEFAULT_GUARDRAILS_CONFIG.maxConsecutiveFailures;
    }

    this.rateLimiter =
      dependencies.rateLimiter ?? new RateLimiter(this.config.maxActionsPerMinute);
    this.sensitiveDetector =
      dependencies.sensitiveDetector ?? new SensitiveDetector();
    this.auditLog =
      dependencies.auditLog ??
      new AuditLog({ filePath: this.config.auditLogPath });
    this.takeover = dependencies.takeover ?? new TakeoverController();
  }

  /**
   * Returns `null` when the action may proceed, or the error explaining the
   * denial.
   */
  validateAction(
    action: string,
    target: string,
    description: string,
  ): CuaError | null {
    const pending = this.takeover.takePending();
    if (pending) {
      this.paused = true;
      this.logger.warn(`Takeover requested: ${pending.message}`);
      return new CuaError(
        CuaErrorCode.HumanTakeover,
        pending.message
          ? `human takeover requested: ${pending.message}`
          : undefined,
      );
    }

    if (this.paused) {
      return new CuaError(CuaErrorCode.HumanTakeover);
    }

    if (this.consecutiveFailures >= this.config.maxConsecutiveFailures) {
      return new CuaError(
        CuaErrorCode.AgentStuck,
        'too many consecutive failures',
      );
    }

    if (!this.rateLimiter.allow()) {
      this.auditLog.logWarning('Rate limited', { action, target });
      return new CuaError(CuaErrorCode.RateLimited);
    }

    if (LEVEL_RANK[this.config.level] >= LEVEL_RANK.normal) {
      const matches = this.sensitiveDetector.check(action, target, description);
      if (matches.length > 0) {
        const highest = this.sensitiveDetector.highestLevel(matches);
        const names = matches.map((match) => match.pattern.name);

        this.auditLog.logWarning('Sensitive action detected', {
          action,
          target,
          matches: matches.length,
          level: SENSITIVE_LEVEL_NAMES[highest],
        });

        const blocked =
          highest >= SensitiveLevel.Block ||
          (this.config.level === 'strict' && highest >= SensitiveLevel.Confirm);
        if (blocked) {
          this.logger.warn(
            `Blocked ${action} on "${target}" (${names.join(', ')})`,
          );
          return new SafetyError(names, SENSITIVE_LEVEL_NAMES[highest]);
        }
      }
    }

    this.auditLog.logAction(action, description, target);
    return null;
  }

  recordSuccess(action: string, target: string, result: string): void {
    this.consecutiveFailures = 0;
    this.auditLog.logActionResult(action, 'Action succeeded', target, result);
  }

  recordFailure(action: string, target: string, error: unknown): void {
    this.consecutiveFailures++;
    this.auditLog.logActionResult(action, 'Action failed', target, '', error);
  }

  getConsecutiveFailures(): number {
    return this.consecutiveFailures;
  }

  resetFailures(): void {
    this.consecutiveFailures = 0;
  }

  requestTakeover(message = ''): void {
    this.takeover.requestAsync(TakeoverReason.Programmatic, message);
  }

  takeoverRequested(): boolean {
    return this.paused;
  }

  resume(): void {
    this.paused = false;
    this.takeover.clearPending();
  }

  pause(): void {
    this.paused = true;
  }

  isPaused(): boolean {
    return this.paused;
  }

  get level(): SafetyLevel {
    return this.config.level;
  }

  setLevel(level: SafetyLevel): void {
    this.config = { ...this.config, level };
  }

  get maxConsecutiveFailures(): number {
    return this.config.maxConsecutiveFailures;
  }

  getAuditEntries(): AuditEntry[] {
    return this.auditLog.getEntries();
  }
}
