import { Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';

export type AuditLevel = 'INFO' | 'WARNING' | 'ERROR' | 'ACTION';

export interface AuditEntry {
  timestamp: Date;
  level: AuditLevel;
  action: string;
  description: string;
  target?: string;
  result?: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

export interface AuditLogOptions {
  /** JSON-lines file that receives every entry. */
  filePath?: string;
  maxEntries?: number;
  now?: () => Date;
}

export const DEFAULT_AUDIT_CAPACITY = 1000;

/**
 * In-memory ring of audit entries with an optional append-only JSON-lines
 * file. When full, the oldest quarter is dropped.
 */
export class AuditLog {
  private readonly logger = new Logger(AuditLog.name);
  private readonly maxEntries: number;
  private readonly filePath?: string;
  private readonly now: () => Date;
  private entries: AuditEntry[] = [];
  private writes: Promise<void> = Promise.resolve();

  constructor(options: AuditLogOptions = {}) {
    this.maxEntries =
      options.maxEntries && options.maxEntries > 0
        ? options.maxEntries
        : DEFAULT_AUDIT_CAPACITY;
    this.now = options.now ?? (() => new Date());

    if (options.filePath) {
      this.filePath = options.filePath;
      this.writes = this.initialise(options.filePath);
    }
  }

  private async initialise(filePath: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
    } catch (error) {
      this.logger.warn(
        `Failed to create audit log directory for ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  log(entry: Omit<AuditEntry, 'timestamp'> & { timestamp?: Date }): void {
    const complete: AuditEntry = { ...entry, timestamp: entry.timestamp ?? this.now() };

    if (this.entries.length >= this.maxEntries) {
      this.entries = this.entries.slice(Math.floor(this.maxEntries / 4));
    }
    this.entries.push(complete);

    if (this.filePath) {
      const filePath = this.filePath;
      this.writes = this.writes.then(() =>
        this.append(filePath, `${JSON.stringify(complete)}\n`),
      );
    }
  }

  /** Resolves once every entry logged so far has reached the file. */
  flush(): Promise<void> {
    return this.writes;
  }

  private async append(filePath: string, line: string): Promise<void> {
    try {
      await fs.appendFile(filePath, line, 'utf8');
    } catch (error) {
      this.logger.warn(
        `Failed to append to audit log ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  logAction(action: string, description: string, target: string): void {
    this.log({ level: 'ACTION', action, description, target });
  }

  logActionResult(
    action: string,
    description: string,
    target: string,
    result: string,
    error?: unknown,
  ): void {
    if (error === undefined) {
      this.log({ level: 'ACTION', action, description, target, result });
      return;
    }
    this.log({
      level: 'ERROR',
      action,
      description,
      target,
      result,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  logWarning(description: string, metadata?: Record<string, unknown>): void {
    this.log({ level: 'WARNING', action: '', description, metadata });
  }

  logError(description: string, error: unknown): void {
    this.log({
      level: 'ERROR',
      action: '',
      description,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  getEntriesSince(since: Date): AuditEntry[] {
    return this.entries.filter(
      (entry) => entry.timestamp.getTime() >= since.getTime(),
    );
  }

  clear(): void {
    this.entries = [];
  }

  count(): number {
    return this.entries.length;
  }
}
