import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ExecutionInProgressError, NotValidatedError } from '../src/common/errors';
import {
  ExecutionController,
  ExecutionControllerOptions,
  assertValidated,
  isExecutionInProgress
} from '../src/execution/execution-controller';
import { ProcessOutcome } from '../src/execution/script-runner';
import { sanitizeScript } from '../src/remediation/script-sanitizer';
import { validateScript } from '../src/security';
import { RestorePointResult } from '../src/types';
import { createMockLogger } from './helpers/mock-logger';

const NOW = new Date('2026-03-01T10:00:00.000Z');
const clock = (): Date => NOW;

const script = sanitizeScript('Write-Host "ok"\nWrite-Host "done"');
const report = validateScript(script);

const okOutcome: ProcessOutcome = { exitCode: 0, stdout: 'done', stderr: '', timedOut: false };

function createRunner() {
  return {
    runFile: jest.fn(async (_filePath: string, _timeoutMs: number): Promise<ProcessOutcome> => okOutcome),
    runCommand: jest.fn(async (_script: string, _timeoutMs: number): Promise<ProcessOutcome> => okOutcome)
  };
}

function createRestorePoints() {
  return {
    create: jest.fn(async (): Promise<RestorePointResult> => ({ created: true, id: '7', description: 'backup' }))
  };
}

let tmpDir: string;
let options: ExecutionControllerOptions;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'remedy-exec-test-'));
  options = { workDir: path.join(tmpDir, 'work'), scriptTimeoutMs: 5000, createRestorePoint: true, requireRestorePoint: false };
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('ExecutionController - validation binding', () => {
  it('refuses a script that did not pass validation and launches nothing', async () => {
    const runner = createRunner();
    const restorePoints = createRestorePoints();
    const blocked = sanitizeScript("Stop-Service -Name 'wuauserv' -ErrorAction SilentlyContinue");
    const controller = new ExecutionController(runner, restorePoints, options, createMockLogger(), clock);

    await expect(controller.execute(blocked, validateScript(blocked))).rejects.toBeInstanceOf(NotValidatedError);
    expect(runner.runFile).not.toHaveBeenCalled();
    expect(restorePoints.create).not.toHaveBeenCalled();
  });

  it('refuses a report produced for a different script', async () => {
    const runner = createRunner();
    const other = sanitizeScript('Write-Host "something else"');
    const controller = new ExecutionController(runner, createRestorePoints(), options, createMockLogger(), clock);

    await expect(controller.execute(other, report)).rejects.toThrow(
      'Script has not passed safety validation: safety report was produced for a different script'
    );
    expect(runner.runFile).not.toHaveBeenCalled();
  });

  it('accepts the report it was produced from', () => {
    expect(() => assertValidated(script, report)).not.toThrow();
  });
});

describe('ExecutionController - running', () => {
  it('creates a restore point, runs the script file and removes it', async () => {
    const runner = createRunner();
    const restorePoints = createRestorePoints();
    let written = '';
    let scriptPath = '';
    runner.runFile.mockImplementationOnce(async filePath => {
      scriptPath = filePath;
      written = fs.readFileSync(filePath, 'utf8');
      return okOutcome;
    });
    const controller = new ExecutionController(runner, restorePoints, options, createMockLogger(), clock);

    const result = await controller.execute(script, report);

    expect(result).toEqual({
      exitCode: 0,
      stdout: 'done',
      stderr: '',
      startedAt: '2026-03-01T10:00:00.000Z',
      finishedAt: '2026-03-01T10:00:00.000Z',
      restorePointId: '7',
      restorePointError: undefined,
      timedOut: false
    });
    expect(Object.isFrozen(result)).toBe(true);
    expect(restorePoints.create).toHaveBeenCalledTimes(1);
    expect(runner.runFile).toHaveBeenCalledWith(scriptPath, 5000);
    expect(path.dirname(scriptPath)).toBe(options.workDir);
    expect(path.basename(scriptPath)).toMatch(/^remediation_[0-9a-f-]{36}\.ps1$/);
    expect(written).toBe('\uFEFF' + script.text.replace(/\n/g, '\r\n'));
    expect(fs.existsSync(scriptPath)).toBe(false);
  });

  it('reports a nonzero exit code without retrying', async () => {
    const runner = createRunner();
    runner.runFile.mockResolvedValueOnce({ exitCode: 3, stdout: '', stderr: 'Access denied', timedOut: false });
    const controller = new ExecutionController(runner, createRestorePoints(), options, createMockLogger(), clock);

    const result = await controller.execute(script, report);

    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('Access denied');
    expect(runner.runFile).toHaveBeenCalledTimes(1);
  });

  it('turns a runner failure into an exit code of -1', async () => {
    const runner = createRunner();
    runner.runFile.mockRejectedValueOnce(new Error('spawn EACCES'));
    const logger = createMockLogger();
    const controller = new ExecutionController(runner, createRestorePoints(), options, logger, clock);

    const result = await controller.execute(script, report);

    expect(result.exitCode).toBe(-1);
    expect(result.stderr).toBe('spawn EACCES');
    expect(logger.error).toHaveBeenCalled();
    expect(isExecutionInProgress()).toBe(false);
  });

  it('skips the restore point when disabled', async () => {
    const restorePoints = createRestorePoints();
    const controller = new ExecutionController(
      createRunner(), restorePoints, { ...options, createRestorePoint: false }, createMockLogger(), clock
    );

    const result = await controller.execute(script, report);

    expect(restorePoints.create).not.toHaveBeenCalled();
    expect(result.restorePointId).toBeUndefined();
    expect(result.restorePointError).toBeUndefined();
  });
});

describe('ExecutionController - restore point policy', () => {
  const failedRestorePoint: RestorePointResult = { created: false, description: 'backup', error: 'Access denied' };

  it('continues after a failed restore point by default', async () => {
    const runner = createRunner();
    const restorePoints = createRestorePoints();
    restorePoints.create.mockResolvedValueOnce(failedRestorePoint);
    const controller = new ExecutionController(runner, restorePoints, options, createMockLogger(), clock);

    const result = await controller.execute(script, report);

    expect(runner.runFile).toHaveBeenCalledTimes(1);
    expect(result.exitCode).toBe(0);
    expect(result.restorePointId).toBeUndefined();
    expect(result.restorePointError).toBe('Access denied');
  });

  it('blocks the run when a restore point is required', async () => {
    const runner = createRunner();
    const restorePoints = createRestorePoints();
    restorePoints.create.mockResolvedValueOnce(failedRestorePoint);
    const controller = new ExecutionController(
      runner, restorePoints, { ...options, requireRestorePoint: true }, createMockLogger(), clock
    );

    const result = await controller.execute(script, report);

    expect(runner.runFile).not.toHaveBeenCalled();
    expect(result.exitCode).toBe(-1);
    expect(result.stderr).toBe('Restore point required but not created: Access denied');
    expect(result.restorePointError).toBe('Access denied');
  });

  it('treats a throwing restore point creator as a failed restore point', async () => {
    const restorePoints = createRestorePoints();
    restorePoints.create.mockRejectedValueOnce(new Error('WMI unavailable'));
    const logger = createMockLogger();
    const controller = new ExecutionController(createRunner(), restorePoints, options, logger, clock);

    const result = await controller.execute(script, report);

    expect(result.restorePointError).toBe('WMI unavailable');
    expect(logger.error).toHaveBeenCalledWith('Restore point creation threw', expect.any(Error));
  });
});

describe('ExecutionController - single run at a time', () => {
  it('rejects a second run while the first is in flight', async () => {
    const runner = createRunner();
    let release: (outcome: ProcessOutcome) => void = () => undefined;
    runner.runFile.mockImplementationOnce(() => new Promise<ProcessOutcome>(resolve => {
      release = resolve;
    }));
    const controller = new ExecutionController(
      runner, createRestorePoints(), { ...options, createRestorePoint: false }, createMockLogger(), clock
    );

    const first = controller.execute(script, report);
    expect(isExecutionInProgress()).toBe(true);
    await expect(controller.execute(script, report)).rejects.toBeInstanceOf(ExecutionInProgressError);

    release(okOutcome);
    await expect(first).resolves.toMatchObject({ exitCode: 0 });
    expect(isExecutionInProgress()).toBe(false);
    expect(runner.runFile).toHaveBeenCalledTimes(1);
  });
});
