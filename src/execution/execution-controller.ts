import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { LoggerLike } from '../common/logger';
import { ExecutionInProgressError, NotValidatedError } from '../common/errors';
import { computeScriptDigest } from '../security';
import { ExecutionResult, RestorePointResult, SafetyReport, SanitizedScript } from '../types';
import { RestorePointCreator } from './restore-point';
import { ProcessOutcome, ScriptRunner } from './script-runner';

export interface ExecutionControllerOptions {
  workDir: string;
  scriptTimeoutMs: number;
  createRestorePoint: boolean;
  /** When set, a failed restore point blocks the run */
  requireRestorePoint: boolean;
}

// One remediation run per process
let activeRunId: string | null = null;

export function isExecutionInProgress(): boolean {
  return activeRunId !== null;
}

/** Throws unless the report passed and was produced for exactly this script text */
export function assertValidated(script: SanitizedScript, report: SafetyReport): void {
  if (!report.passed) {
    throw new NotValidatedError(`${report.violations.length} safety violation(s)`);
  }
  if (report.scriptDigest !== computeScriptDigest(script.text)) {
    throw new NotValidatedError('safety report was produced for a different script');
  }
}

/**
 * Runs validated scripts: restore point first, then one PowerShell process.
 * A failed run is reported, never retried.
 */
export class ExecutionController {
  private runner: ScriptRunner;
  private restorePoints: RestorePointCreator;
  private options: ExecutionControllerOptions;
  private logger: LoggerLike;
  private clock: () => Date;

  constructor(
    runner: ScriptRunner,
    restorePoints: RestorePointCreator,
    options: ExecutionControllerOptions,
    logger: LoggerLike,
    clock: () => Date = () => new Date()
  ) {
    this.runner = runner;
    this.restorePoints = restorePoints;
    this.options = options;
    this.logger = logger;
    this.clock = clock;
  }

  async execute(script: SanitizedScript, report: SafetyReport): Promise<ExecutionResult> {
    assertValidated(script, report);

    if (activeRunId !== null) {
      throw new ExecutionInProgressError(activeRunId);
    }
    const runId = randomUUID();
    activeRunId = runId;

    try {
      return await this.runValidated(runId, script);
    } finally {
      activeRunId = null;
    }
  }

  private async runValidated(runId: string, script: SanitizedScript): Promise<ExecutionResult> {
    const startedAt = this.clock().toISOString();
    this.logger.info('Remediation run starting', { runId, digest: computeScriptDigest(script.text).slice(0, 12) });

    let restorePoint: RestorePointResult | undefined;
    if (this.options.createRestorePoint) {
      restorePoint = await this.createRestorePoint();

      if (!restorePoint.created && this.options.requireRestorePoint) {
        this.logger.warn('Remediation blocked: restore point required but not created', { runId });
        return this.result(startedAt, {
          exitCode: -1,
          stdout: '',
          stderr: `Restore point required but not created: ${restorePoint.error ?? 'unknown error'}`,
          timedOut: false
        }, restorePoint);
      }
    }

    const outcome = await this.runScript(runId, script);

    this.logger.info('Remediation run finished', { runId, exitCode: outcome.exitCode, timedOut: outcome.timedOut });
    return this.result(startedAt, outcome, restorePoint);
  }

  private async createRestorePoint(): Promise<RestorePointResult> {
    try {
      return await this.restorePoints.create();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Restore point creation threw', error);
      return { created: false, description: '', error: message };
    }
  }

  private async runScript(runId: string, script: SanitizedScript): Promise<ProcessOutcome> {
    const filePath = path.join(this.options.workDir, `remediation_${runId}.ps1`);

    try {
      fs.mkdirSync(this.options.workDir, { recursive: true });
      // Windows PowerShell reads BOM-less files in the ANSI code page
      fs.writeFileSync(filePath, '\uFEFF' + script.text.replace(/\n/g, '\r\n'), { encoding: 'utf8', mode: 0o600 });
      return await this.runner.runFile(filePath, this.options.scriptTimeoutMs);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Remediation script could not be run', error, { runId });
      return { exitCode: -1, stdout: '', stderr: message, timedOut: false };
    } finally {
      fs.rmSync(filePath, { force: true });
    }
  }

  private result(startedAt: string, outcome: ProcessOutcome, restorePoint: RestorePointResult | undefined): ExecutionResult {
    return Object.freeze({
      exitCode: outcome.exitCode,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
      startedAt,
      finishedAt: this.clock().toISOString(),
      restorePointId: restorePoint?.created ? restorePoint.id : undefined,
      restorePointError: restorePoint && !restorePoint.created ? restorePoint.error : undefined,
      timedOut: outcome.timedOut
    });
  }
}
