import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger, LogLevel, parseLogLevel } from '../src/common/logger';

let tmpDir: string;
let consoleLog: jest.SpyInstance;
let consoleError: jest.SpyInstance;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'remedy-log-test-'));
  consoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  consoleLog.mockRestore();
  consoleError.mockRestore();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('Logger', () => {
  it('writes component-tagged lines to its log file', () => {
    const logger = new Logger('pipeline', tmpDir);
    logger.info('Run started');

    expect(logger.getLogFile()).toBe(path.join(tmpDir, 'pipeline.log'));
    expect(logger.getRecentLogs()[0]).toMatch(/^\[[^\]]+\] \[INFO\] \[pipeline\] Run started$/);
    expect(consoleLog).toHaveBeenCalledTimes(1);
  });

  it('redacts credentials in messages and data', () => {
    const logger = new Logger('pipeline', tmpDir);
    logger.info('Authorization: Bearer test-token', { apiKey: 'test-secret', category: 'system' });

    const content = fs.readFileSync(logger.getLogFile(), 'utf8');
    expect(content).toContain('Authorization: Bearer [REDACTED]');
    expect(content).toContain('"apiKey": "[REDACTED]"');
    expect(content).toContain('"category": "system"');
    expect(content).not.toContain('test-secret');
  });

  it('skips messages below the minimum level', () => {
    const logger = new Logger('pipeline', tmpDir, LogLevel.WARN);
    logger.info('quiet');
    logger.warn('loud');

    expect(logger.getRecentLogs()).toHaveLength(1);
    expect(logger.getRecentLogs()[0]).toContain('[WARN] [pipeline] loud');
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it('includes error messages and stacks for errors', () => {
    const logger = new Logger('pipeline', tmpDir);
    logger.error('Run failed', new Error('disk full'));

    const lines = logger.getRecentLogs(1000);
    expect(lines).toContain('  Error: disk full');
    expect(lines.some(line => line.startsWith('  Stack: Error: disk full'))).toBe(true);
  });

  it('logs failed operations at error level', () => {
    const logger = new Logger('pipeline', tmpDir);
    logger.endOperation('diagnose', false, { status: 'blocked' });
    expect(logger.getRecentLogs()[0]).toContain('[ERROR] [pipeline] Failed: diagnose');
  });
});

describe('parseLogLevel', () => {
  it('parses names case-insensitively with a fallback', () => {
    expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel('nope')).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined, LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });
});
