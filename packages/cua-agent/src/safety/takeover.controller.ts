import { Logger } from '@nestjs/common';

export enum TakeoverReason {
  ConsecutiveFailures = 'consecutive_failures',
  SensitiveAction = 'sensitive_action',
  Programmatic = 'programmatic',
}

export type TakeoverResponse = 'abort' | 'resume' | 'retry';

export interface TakeoverEvent {
  timestamp: Date;
  reason: TakeoverReason;
  message: string;
}

export type TakeoverHandler = (
  event: TakeoverEvent,
) => TakeoverResponse | Promise<TakeoverResponse>;

const MAX_HISTORY = 50;

/**
 * Hands control to a human. {@link request} asks the handler directly;
 * {@link requestAsync} parks a single pending event that the guardrails
 * pick up before the next action.
 */
export class TakeoverController {
  private readonly logger = new Logger(TakeoverController.name);
  private readonly handler: TakeoverHandler;
  private pending: TakeoverEvent | null = null;
  private history: TakeoverEvent[] = [];

  constructor(handler?: TakeoverHandler) {
    this.handler = handler ?? (() => 'abort');
  }

  async request(
    reason: TakeoverReason,
    message: string,
  ): Promise<TakeoverResponse> {
    const event = this.record(reason, message);
    this.logger.warn(`Takeover requested (${reason}): ${message}`);
    return this.handler(event);
  }

  /**
   * Queues an event without waiting. A second request while one is pending
   * is recorded in history but does not replace the pending one.
   */
  requestAsync(reason: TakeoverReason, message: string): void {
    const event = this.record(reason, message);
    if (!this.pending) {
      this.pending = event;
    }
  }

  /** Removes and returns the pending event, if any. */
  takePending(): TakeoverEvent | null {
    const event = this.pending;
    this.pending = null;
    return event;
  }

  clearPending(): void {
    this.pending = null;
  }

  getHistory(): TakeoverEvent[] {
    return this.history.map((event) => ({ ...event }));
  }

  clearHistory(): void {
    this.history = [];
  }

  private record(reason: TakeoverReason, message: string): TakeoverEvent {
    const event: TakeoverEvent = { timestamp: new Date(), reason, message };
    this.history.push(event);
    if (this.history.length > MAX_HISTORY) {
      this.history = this.history.slice(-MAX_HISTORY);
    }
    return event;
  }
}
