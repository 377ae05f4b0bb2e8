import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import * as winston from 'winston';
import { createWinstonLogger, formatLogLine, resolveLogDir } from './winston-logger';

describe('formatLogLine', () => {
  it('prints timestamp, level and context', () => {
    expect(
      formatLogLine({
        timestamp: '2026-01-02 03:04:05',
        level: 'warn',
        message: 'Rate limited',
        context: 'Guardrails',
      }),
    ).toBe('[2026-01-02 03:04:05] [WARN] [Guardrails] Rate limited');
  });

  it('appends the stack when present', () => {
    expect(
      formatLogLine({
        timestamp: 't',
        level: 'error',
        message: 'boom',
        stack: 'Error: boom\n    at x',
      }),
    ).toBe('[t] [ERROR] boom\nError: boom\n    at x');
  });
});

describe('createWinstonLogger', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = mkdtempSync(join(tmpdir(), 'cua-logs-'));
  });

  afterEach(() => {
    rmSync(logDir, { recursive: true, force: true });
  });

  it('writes to the console and two rotating files', () => {
    const logger = createWinstonLogger({ logDir, level: 'warn' });

    expect(logger.transports).toHaveLength(3);
    const consoleTransport = logger.transports.find(
      (transport) => transport instanceof winston.transports.Console,
    );
    expect(consoleTransport?.level).toBe('warn');

    logger.close();
  });

  it('uses an explicit log directory as given', () => {
    expect(resolveLogDir(logDir)).toBe(logDir);
  });
});
