export type Phase =
  | 'navigation'
  | 'form_filling'
  | 'authentication'
  | 'search'
  | 'browsing'
  | 'confirmation'
  | 'checkout'
  | '';

export interface ActionResult {
  stepNumber: number;
  action: string;
  args: Record<string, unknown>;
  success: boolean;
  /** Tool output on success, the error text on failure. */
  result: string;
  durationMs: number;
  timestamp: Date;
}

export interface MemoryError {
  message: string;
  action: string;
  stepNumber: number;
  timestamp: Date;
  recoverable: boolean;
}

export interface PhaseObservation {
  visibleText?: string;
  focusedRole?: string;
  flags?: {
    passwordField?: boolean;
    formFields?: boolean;
    searchField?: boolean;
  };
}

/** Immutable snapshot of a {@link TaskMemory}. */
export interface TaskSummary {
  originalTask: string;
  durationMs: number;
  totalSteps: number;
  phase: Phase;
  milestones: string[];
  keyFacts: Record<string, string>;
  recentActions: ActionResult[];
  consecutiveFails: number;
  lastError: MemoryError | null;
  failedPatterns: string[];
  isStuck: boolean;
  needsHelp: boolean;
}
