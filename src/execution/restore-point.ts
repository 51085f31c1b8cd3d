import { LoggerLike } from '../common/logger';
import { RestorePointResult } from '../types';
import { ScriptRunner } from './script-runner';

export const DEFAULT_RESTORE_POINT_DESCRIPTION = 'Remedy Agent Auto-Backup';

const RESTORE_POINT_TIMEOUT_MS = 120000;

export interface RestorePointCreator {
  create(description?: string): Promise<RestorePointResult>;
}

function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function buildRestorePointScript(description: string): string {
  return [
    'try {',
    `    Checkpoint-Computer -Description ${quotePowerShell(description)} -RestorePointType 'MODIFY_SETTINGS' -ErrorAction Stop`,
    '    $rp = Get-ComputerRestorePoint | Sort-Object SequenceNumber -Descending | Select-Object -First 1',
    '    Write-Output "SUCCESS:$($rp.SequenceNumber)"',
    '} catch {',
    '    Write-Output "FAILED: $_"',
    '    exit 1',
    '}'
  ].join('\n');
}

/**
 * Creates a System Restore checkpoint before remediation. Failures are
 * returned as data; the caller decides whether they block execution.
 */
export class RestorePointManager implements RestorePointCreator {
  private runner: ScriptRunner;
  private logger: LoggerLike;
  private timeoutMs: number;
  private clock: () => Date;

  constructor(runner: ScriptRunner, logger: LoggerLike, timeoutMs: number = RESTORE_POINT_TIMEOUT_MS, clock: () => Date = () => new Date()) {
    this.runner = runner;
    this.logger = logger;
    this.timeoutMs = timeoutMs;
    this.clock = clock;
  }

  async create(description: string = DEFAULT_RESTORE_POINT_DESCRIPTION): Promise<RestorePointResult> {
    const fullDescription = `${description} - ${formatTimestamp(this.clock())}`;
    this.logger.info('Creating system restore point', { description: fullDescription });

    const outcome = await this.runner.runCommand(buildRestorePointScript(fullDescription), this.timeoutMs);

    if (outcome.timedOut) {
      const error = 'Timeout: restore point creation took too long';
      this.logger.warn('Restore point creation timed out');
      return { created: false, description: fullDescription, error };
    }

    const success = outcome.stdout.match(/SUCCESS:(\d*)/);
    if (outcome.exitCode === 0 && success) {
      const id = success[1].length > 0 ? success[1] : fullDescription;
      this.logger.info('Restore point created', { id });
      return { created: true, id, description: fullDescription };
    }

    const error = outcome.stderr.trim() || outcome.stdout.trim() || 'Unknown error';
    this.logger.warn('Restore point creation failed', { error, exitCode: outcome.exitCode });
    return { created: false, description: fullDescription, error };
  }
}
