import { detectPhase } from './phase-detector';
import { Summarizer } from './summarizer';
import {
  ActionResult,
  MemoryError,
  Phase,
  PhaseObservation,
  TaskSummary,
} from './memory.types';

export const MAX_RECENT_ACTIONS = 5;
export const MAX_MILESTONES = 20;
export const MAX_FAILED_PATTERNS = 10;
export const STUCK_THRESHOLD = 3;
export const NEEDS_HELP_THRESHOLD = 5;

/**
 * Bounded record of a task's progress. The original task is kept verbatim;
 * everything else is windowed or summarized so the rendered prompt stays
 * small on long runs.
 */
export class TaskMemory {
  readonly startedAt = new Date();

  private milestones: string[] = [];
  private phase: Phase = '';
  private phaseStartStep = 0;
  private readonly keyFacts = new Map<string, string>();
  private recentActions: ActionResult[] = [];
  private totalSteps = 0;
  private consecutiveFails = 0;
  private lastError: MemoryError | null = null;
  private failedPatterns: string[] = [];

  constructor(
    readonly originalTask: string,
    private readonly summarizer = new Summarizer(MAX_RECENT_ACTIONS),
  ) {}

  recordAction(
    action: string,
    args: Record<string, unknown>,
    success: boolean,
    result: string,
    durationMs: number,
  ): void {
    this.totalSteps++;

    this.recentActions.push({
      stepNumber: this.totalSteps,
      action,
      args: { ...args },
      success,
      result,
      durationMs,
      timestamp: new Date(),
    });

    if (this.summarizer.shouldSummarize(this.recentActions)) {
      const { milestones, remaining } = this.summarizer.summarize(
        this.recentActions,
      );
      milestones.forEach((milestone) => this.addMilestone(milestone));
      this.recentActions = remaining;
    }

    if (success) {
      this.consecutiveFails = 0;
      this.lastError = null;
      return;
    }

    this.consecutiveFails++;
    this.lastError = {
      message: result,
      action,
      stepNumber: this.totalSteps,
      timestamp: new Date(),
      recoverable: this.consecutiveFails < STUCK_THRESHOLD,
    };
  }

  addMilestone(milestone: string): void {
    this.milestones.push(milestone);
    if (this.milestones.length > MAX_MILESTONES) {
      this.milestones = this.milestones.slice(-MAX_MILESTONES);
    }
  }

  /**
   * Switching phase folds the outgoing phase's recent actions into one
   * milestone and clears the window. Setting the current phase again does
   * nothing.
   */
  setPhase(phase: Phase): void {
    if (phase === this.phase) {
      return;
    }

    const milestone = this.summarizer.summarizeForPhaseChange(
      this.phase,
      this.recentActions,
    );
    if (milestone) {
      this.addMilestone(milestone);
    }

    this.phase = phase;
    this.phaseStartStep = this.totalSteps;
    this.recentActions = [];
  }

  maybeUpdatePhase(observation: PhaseObservation): Phase {
    const detected = detectPhase(observation);
    if (detected !== null) {
      this.setPhase(detected);
    }
    return this.phase;
  }

  get currentPhase(): Phase {
    return this.phase;
  }

  get stepsInPhase(): number {
    return this.totalSteps - this.phaseStartStep;
  }

  setKeyFact(key: string, value: string): void {
    this.keyFacts.set(key, value);
  }

  getKeyFact(key: string): string | undefined {
    return this.keyFacts.get(key);
  }

  addFailedPattern(pattern: string): void {
    if (this.failedPatterns.includes(pattern)) {
      return;
    }
    this.failedPatterns.push(pattern);
    if (this.failedPatterns.length > MAX_FAILED_PATTERNS) {
      this.failedPatterns = this.failedPatterns.slice(-MAX_FAILED_PATTERNS);
    }
  }

  hasFailedPattern(pattern: string): boolean {
    return this.failedPatterns.includes(pattern);
  }

  isStuck(): boolean {
    return this.consecutiveFails >= STUCK_THRESHOLD;
  }

  needsHelp(): boolean {
    return this.consecutiveFails >= NEEDS_HELP_THRESHOLD;
  }

  durationMs(): number {
    return Date.now() - this.startedAt.getTime();
  }

  summary(): TaskSummary {
    return {
      originalTask: this.originalTask,
      durationMs: this.durationMs(),
      totalSteps: this.totalSteps,
      phase: this.phase,
      milestones: [...this.milestones],
      keyFacts: Object.fromEntries(this.keyFacts),
      recentActions: this.recentActions.map((action) => ({
        ...action,
        args: { ...action.args },
      })),
      consecutiveFails: this.consecutiveFails,
      lastError: this.lastError ? { ...this.lastError } : null,
      failedPatterns: [...this.failedPatterns],
      isStuck: this.isStuck(),
      needsHelp: this.needsHelp(),
    };
  }

  toPrompt(): string {
    return renderTaskSummary(this.summary());
  }
}

/**
 * Renders a snapshot as the context block injected into the system prompt.
 * Empty sections are left out.
 */
export function renderTaskSummary(summary: TaskSummary): string {
  const sections: string[] = [`## TASK\n${summary.originalTask}`];

  if (summary.milestones.length > 0) {
    sections.push(
      `## ACCOMPLISHED\n${summary.milestones
        .map((milestone, index) => `${index + 1}. ${milestone}`)
        .join('\n')}`,
    );
  }

  if (summary.phase) {
    sections.push(`## CURRENT PHASE: ${summary.phase}`);
  }

  const facts = Object.entries(summary.keyFacts);
  if (facts.length > 0) {
    sections.push(
      `## KEY FACTS\n${facts.map(([key, value]) => `- ${key}: ${value}`).join('\n')}`,
    );
  }

  if (summary.recentActions.length > 0) {
    sections.push(
      `## RECENT ACTIONS\n${summary.recentActions
        .map((action) => {
          const mark = action.success ? '✓' : '✗';
          const detail = action.result ? ` - ${action.result}` : '';
          return `${mark} Step ${action.stepNumber}: ${action.action}${detail}`;
        })
        .join('\n')}`,
    );
  }

  if (summary.failedPatterns.length > 0) {
    sections.push(
      `## KNOWN ISSUES (avoid repeating)\n${summary.failedPatterns
        .map((pattern) => `- ${pattern}`)
        .join('\n')}`,
    );
  }

  if (summary.needsHelp) {
    sections.push(
      `## STATUS: NEEDS HELP\n${summary.consecutiveFails} consecutive failures. Call need_help unless a clearly different approach is available.`,
    );
  } else if (summary.isStuck) {
    sections.push(
      `## STATUS: POSSIBLY STUCK\n${summary.consecutiveFails} consecutive failures. Try a different approach.`,
    );
  }

  return sections.join('\n\n');
}
