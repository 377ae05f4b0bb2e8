/**
 * Error taxonomy shared by the agent core and the native backends.
 *
 * Every failure the library raises is a {@link CuaError} carrying a
 * {@link CuaErrorCode}, or a wrapper whose `cause` chain leads to one.
 * Use {@link isCuaError} rather than `instanceof` checks against wrappers.
 */

export enum CuaErrorCode {
  NoApiKey = "no_api_key",
  Timeout = "timeout",
  Canceled = "canceled",
  MaxActions = "max_actions",
  AgentBusy = "agent_busy",
  HumanTakeover = "human_takeover",
  AgentStuck = "agent_stuck",
  PermissionDenied = "permission_denied",
  ElementNotFound = "element_not_found",
  RateLimited = "rate_limited",
  SafetyBlock = "safety_block",
  NotSupported = "not_supported",
  InvalidRect = "invalid_rect",
  InvalidDisplay = "invalid_display",
  CaptureFailed = "capture_failed",
}

const DEFAULT_MESSAGES: Record<CuaErrorCode, string> = {
  [CuaErrorCode.NoApiKey]:
    "no API key provided (set GOOGLE_API_KEY or GEMINI_API_KEY, or pass apiKey)",
  [CuaErrorCode.Timeout]: "task timed out",
  [CuaErrorCode.Canceled]: "operation canceled",
  [CuaErrorCode.MaxActions]: "exceeded maximum actions",
  [CuaErrorCode.AgentBusy]: "agent is busy with another task",
  [CuaErrorCode.HumanTakeover]: "human takeover requested",
  [CuaErrorCode.AgentStuck]: "agent stuck, unable to proceed",
  [CuaErrorCode.PermissionDenied]: "permission denied",
  [CuaErrorCode.ElementNotFound]: "element not found",
  [CuaErrorCode.RateLimited]: "rate limited, too many actions",
  [CuaErrorCode.SafetyBlock]: "action blocked by safety check",
  [CuaErrorCode.NotSupported]: "operation not supported on this platform",
  [CuaErrorCode.InvalidRect]: "invalid capture rectangle",
  [CuaErrorCode.InvalidDisplay]: "invalid display index",
  [CuaErrorCode.CaptureFailed]: "screen capture failed",
};

const FATAL_CODES: ReadonlySet<CuaErrorCode> = new Set([
  CuaErrorCode.NoApiKey,
  CuaErrorCode.PermissionDenied,
  CuaErrorCode.NotSupported,
  CuaErrorCode.HumanTakeover,
  CuaErrorCode.Canceled,
]);

export class CuaError extends Error {
  readonly code: CuaErrorCode;

  constructor(code: CuaErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? DEFAULT_MESSAGES[code], options);
    this.name = "CuaError";
    this.code = code;
  }
}

/**
 * Raised by the accessibility backend when a query yields nothing.
 */
export class ElementError extends CuaError {
  constructor(readonly query: string) {
    super(CuaErrorCode.ElementNotFound, `element not found: ${query}`);
    this.name = "ElementError";
  }
}

/**
 * Missing OS permission (accessibility, screen recording, automation).
 */
export class PermissionError extends CuaError {
  constructor(
    readonly permission: string,
    options?: ErrorOptions,
  ) {
    super(
      CuaErrorCode.PermissionDenied,
      `permission denied (${permission})`,
      options,
    );
    this.name = "PermissionError";
  }
}

export class SafetyError extends CuaError {
  constructor(
    readonly patterns: string[],
    readonly severity: string,
  ) {
    super(
      CuaErrorCode.SafetyBlock,
      patterns.length > 0
        ? `${DEFAULT_MESSAGES[CuaErrorCode.SafetyBlock]} (${patterns.join(", ")})`
        : DEFAULT_MESSAGES[CuaErrorCode.SafetyBlock],
    );
    this.name = "SafetyError";
  }
}

export class ActionError extends Error {
  constructor(
    readonly step: number,
    readonly action: string,
    readonly description: string,
    cause: unknown,
  ) {
    super(
      `step ${step} failed: ${action} (${description}): ${describeError(cause)}`,
      { cause },
    );
    this.name = "ActionError";
  }
}

export class TaskError extends Error {
  constructor(
    readonly task: string,
    readonly stepsTotal: number,
    readonly stepsFailed: number,
    readonly lastAction: string,
    cause: unknown,
  ) {
    super(
      `task failed after ${stepsTotal} steps (${stepsFailed} failed): ${describeError(cause)}`,
      { cause },
    );
    this.name = "TaskError";
  }
}

/**
 * Returns the first {@link CuaError} in the cause chain, optionally
 * restricted to a code.
 */
export function findCuaError(
  error: unknown,
  code?: CuaErrorCode,
): CuaError | undefined {
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    if (current instanceof CuaError && (code === undefined || current.code === code)) {
      return current;
    }
    current = current.cause;
  }

  return undefined;
}

export function isCuaError(error: unknown, code: CuaErrorCode): boolean {
  return findCuaError(error, code) !== undefined;
}

export function isRetryable(error: unknown): boolean {
  if (isCuaError(error, CuaErrorCode.RateLimited)) {
    return true;
  }
  return (
    error instanceof ActionError &&
    isCuaError(error.cause, CuaErrorCode.ElementNotFound)
  );
}

export function isFatal(error: unknown): boolean {
  const cuaError = findCuaError(error);
  return cuaError !== undefined && FATAL_CODES.has(cuaError.code);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
