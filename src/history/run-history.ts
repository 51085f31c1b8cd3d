import { LoggerLike } from '../common/logger';
import { Database } from '../core/database';
import { PipelineStatus, RiskLevel, RunRecord } from '../types';

const STATUSES: readonly PipelineStatus[] = ['no-remediation', 'blocked', 'declined', 'executed'];
const RISK_LEVELS: readonly RiskLevel[] = ['NONE', 'VERY LOW', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function asOptionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toRunRecord(row: unknown): RunRecord | null {
  if (!isRecord(row)) {
    return null;
  }
  const status = STATUSES.find(candidate => candidate === row.status);
  if (!status) {
    return null;
  }
  return {
    runId: asString(row.run_id),
    problemHtml: asString(row.problem_text),
    status,
    wellFormed: row.well_formed === 1,
    safetyPassed: row.safety_passed === 1,
    violationCount: typeof row.violation_count === 'number' ? row.violation_count : 0,
    riskLevel: RISK_LEVELS.find(candidate => candidate === row.risk_level),
    executed: row.executed === 1,
    exitCode: typeof row.exit_code === 'number' ? row.exit_code : undefined,
    restorePointId: asOptionalString(row.restore_point_id),
    startedAt: asString(row.started_at),
    finishedAt: asString(row.finished_at)
  };
}

/**
 * Persistent log of diagnostic runs. Recording is best-effort: a failed write
 * is logged and the run continues.
 */
export class RunHistory {
  private db: Database;
  private logger: LoggerLike;

  constructor(db: Database, logger: LoggerLike) {
    this.db = db;
    this.logger = logger;
  }

  async record(run: RunRecord): Promise<boolean> {
    try {
      await this.db.run(
        `INSERT INTO diagnostic_runs
          (run_id, problem_text, status, well_formed, safety_passed, violation_count,
           risk_level, executed, exit_code, restore_point_id, started_at, finished_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          run.runId,
          run.problemHtml,
          run.status,
          run.wellFormed ? 1 : 0,
          run.safetyPassed ? 1 : 0,
          run.violationCount,
          run.riskLevel ?? null,
          run.executed ? 1 : 0,
          run.exitCode ?? null,
          run.restorePointId ?? null,
          run.startedAt,
          run.finishedAt
        ]
      );
      return true;
    } catch (error) {
      this.logger.error('Failed to record diagnostic run', error, { runId: run.runId });
      return false;
    }
  }

  async recent(limit: number = 10): Promise<RunRecord[]> {
    const rows = await this.db.all(
      'SELECT * FROM diagnostic_runs ORDER BY started_at DESC, id DESC LIMIT ?',
      [limit]
    );
    const runs: RunRecord[] = [];
    for (const row of rows) {
      const run = toRunRecord(row);
      if (run) {
        runs.push(run);
      }
    }
    return runs;
  }

  async find(runId: string): Promise<RunRecord | null> {
    const row = await this.db.get('SELECT * FROM diagnostic_runs WHERE run_id = ?', [runId]);
    return row === undefined ? null : toRunRecord(row);
  }

  async summary(): Promise<{ total: number; executed: number; blocked: number; failed: number }> {
    const row = await this.db.get(
      `SELECT COUNT(*) AS total,
              SUM(CASE WHEN executed = 1 THEN 1 ELSE 0 END) AS executed,
              SUM(CASE WHEN status = 'blocked' THEN 1 ELSE 0 END) AS blocked,
              SUM(CASE WHEN executed = 1 AND exit_code <> 0 THEN 1 ELSE 0 END) AS failed
       FROM diagnostic_runs`
    );
    const count = (value: unknown): number => (typeof value === 'number' ? value : 0);
    if (!isRecord(row)) {
      return { total: 0, executed: 0, blocked: 0, failed: 0 };
    }
    return {
      total: count(row.total),
      executed: count(row.executed),
      blocked: count(row.blocked),
      failed: count(row.failed)
    };
  }
}
