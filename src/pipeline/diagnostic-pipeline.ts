import { randomUUID } from 'crypto';
import { LoggerLike } from '../common/logger';
import { callModelWithTimeout, ModelTransport } from '../ai/model-client';
import { DEFAULT_PROBLEM_TEXT, PromptBuilder } from '../ai/prompt-builder';
import { ResponseParser } from '../ai/response-parser';
import { detectStateChanges, formatStateChange, generateRollbackScript, StateChange, SystemState } from '../execution/state-monitor';
import { RunHistory } from '../history/run-history';
import { KnowledgeBase, KnowledgeCheck } from '../knowledge/knowledge-base';
import { DryRunSimulator } from '../remediation/dry-run';
import { normalizeScript, ScriptSanitizer } from '../remediation/script-sanitizer';
import { escapeUserText, sanitizeModelText, summarizeExecution } from '../report/report-sanitizer';
import { buildVerificationReport, VerificationReport } from '../report/verification-reporter';
import { SafetyValidator } from '../security/script-validator';
import {
  DryRunSummary,
  ExecutionReportFragment,
  ExecutionResult,
  ParsedDiagnosis,
  PipelineStatus,
  SafetyReport,
  SanitizedReportFragment,
  SanitizedScript,
  TelemetrySnapshot
} from '../types';

/** Fix bodies shorter than this, ignoring whitespace, are not offered */
export const MIN_SCRIPT_CHARS = 10;

export interface ConfirmationRequest {
  script: SanitizedScript;
  safety: SafetyReport;
  dryRun: DryRunSummary;
  knowledge?: KnowledgeCheck;
}

/** Resolves true to run the script. Declining ends the run with nothing started. */
export type ConfirmCallback = (request: ConfirmationRequest) => Promise<boolean>;

export interface ScriptExecutor {
  execute(script: SanitizedScript, report: SafetyReport): Promise<ExecutionResult>;
}

export interface StateMonitor {
  capture(): Promise<SystemState>;
}

export interface DiagnosticPipelineOptions {
  categories: readonly string[];
  modelTimeoutMs: number;
  executionEnabled: boolean;
}

export interface DiagnosticPipelineDeps {
  transport: ModelTransport;
  executor: ScriptExecutor;
  history?: RunHistory;
  /** Captures system state before and after execution */
  monitor?: StateMonitor;
  knowledge?: KnowledgeBase;
  logger: LoggerLike;
  clock?: () => Date;
}

export interface PipelineOutcome {
  runId: string;
  status: PipelineStatus;
  /** Model output was received; false when the call failed or timed out */
  modelResponded: boolean;
  wellFormed: boolean;
  problem: SanitizedReportFragment;
  analysis: SanitizedReportFragment;
  notices: SanitizedReportFragment[];
  script?: SanitizedScript;
  safety?: SafetyReport;
  dryRun?: DryRunSummary;
  execution?: ExecutionResult;
  executionReport?: ExecutionReportFragment;
  knowledge?: KnowledgeCheck;
  /** Set only when both state captures succeeded */
  stateChanges?: StateChange[];
  /** Restores changed services; set when there are changes */
  rollbackScript?: string;
  verification: VerificationReport;
  startedAt: string;
  finishedAt: string;
}

export function hasUsableScript(diagnosis: ParsedDiagnosis): boolean {
  return normalizeScript(diagnosis.rawScript).replace(/\s/g, '').length >= MIN_SCRIPT_CHARS;
}

/**
 * One diagnostic run: prompt, model call, parse, sanitize, validate,
 * confirm, execute and verify, in that order. Every stage object is created
 * per run.
 */
export class DiagnosticPipeline {
  private deps: DiagnosticPipelineDeps;
  private options: DiagnosticPipelineOptions;
  private clock: () => Date;

  constructor(deps: DiagnosticPipelineDeps, options: DiagnosticPipelineOptions) {
    this.deps = deps;
    this.options = options;
    this.clock = deps.clock ?? (() => new Date());
  }

  async run(userText: string, snapshot: TelemetrySnapshot, confirm: ConfirmCallback): Promise<PipelineOutcome> {
    const { logger } = this.deps;
    const runId = randomUUID();
    const startedAt = this.clock().toISOString();
    const notices: SanitizedReportFragment[] = [];

    const problem = escapeUserText(userText.trim().length > 0 ? userText : DEFAULT_PROBLEM_TEXT);

    const request = new PromptBuilder({ categories: this.options.categories }).build(snapshot, userText);
    logger.info('Requesting AI diagnosis', { runId, categories: request.categories });

    const response = await callModelWithTimeout(this.deps.transport, request, this.options.modelTimeoutMs, logger);
    const diagnosis = new ResponseParser().parse(response);
    const analysis = sanitizeModelText(diagnosis.analysisText);

    if (response.length === 0) {
      notices.push(escapeUserText('No AI analysis available. Telemetry data is still included below.'));
    } else if (!diagnosis.wellFormed) {
      logger.warn('Model response did not follow the expected structure', { runId });
      notices.push(escapeUserText('The AI response was incomplete; only the parts that could be read are shown.'));
    }

    const finish = async (
      status: PipelineStatus,
      extra: Pick<PipelineOutcome, 'script' | 'safety' | 'dryRun' | 'execution' | 'knowledge' | 'stateChanges' | 'rollbackScript'> = {}
    ): Promise<PipelineOutcome> => {
      const executionReport = extra.execution ? summarizeExecution(extra.execution) : undefined;
      const verification = buildVerificationReport({
        problem,
        analysis,
        execution: executionReport,
        notices,
        stateChanges: extra.stateChanges?.map(change => escapeUserText(formatStateChange(change)))
      });
      const outcome: PipelineOutcome = {
        runId,
        status,
        modelResponded: response.length > 0,
        wellFormed: diagnosis.wellFormed,
        problem,
        analysis,
        notices,
        ...extra,
        executionReport,
        verification,
        startedAt,
        finishedAt: this.clock().toISOString()
      };
      await this.record(outcome);
      logger.info('Diagnostic run complete', { runId, status });
      return outcome;
    };

    if (!hasUsableScript(diagnosis)) {
      return finish('no-remediation');
    }

    const script = new ScriptSanitizer().sanitize(diagnosis.rawScript);
    const safety = new SafetyValidator().validate(script);
    const dryRun = new DryRunSimulator().simulate(script.text);
    const knowledge = this.deps.knowledge?.check(normalizeScript(diagnosis.rawScript), userText);
    if (knowledge) {
      logger.info('Compared fix with known solutions', { runId, verdict: knowledge.verdict, solution: knowledge.solution?.id });
    }

    if (!safety.passed) {
      logger.warn('Remediation script failed safety validation', {
        runId,
        violations: safety.violations.map(violation => `${violation.rule}@${violation.lineNumber}`)
      });
      notices.push(escapeUserText('The generated remediation script was blocked by safety validation:'));
      for (const violation of safety.violations) {
        notices.push(escapeUserText(`Line ${violation.lineNumber} [${violation.rule}]: ${violation.detail}`));
      }
      return finish('blocked', { script, safety, dryRun, knowledge });
    }

    if (!this.options.executionEnabled) {
      notices.push(escapeUserText('Script execution is disabled by configuration.'));
      return finish('declined', { script, safety, dryRun, knowledge });
    }

    const confirmed = await confirm({ script, safety, dryRun, knowledge });
    if (!confirmed) {
      logger.info('Remediation declined by user', { runId });
      return finish('declined', { script, safety, dryRun, knowledge });
    }

    const before = await this.captureState(runId);
    const execution = await this.deps.executor.execute(script, safety);
    const after = before ? await this.captureState(runId) : undefined;

    if (!before || !after) {
      return finish('executed', { script, safety, dryRun, knowledge, execution });
    }
    const stateChanges = detectStateChanges(before, after);
    logger.info('System state compared', { runId, changes: stateChanges.length });
    const rollbackScript = stateChanges.length > 0 ? generateRollbackScript(stateChanges, after.capturedAt) : undefined;
    return finish('executed', { script, safety, dryRun, knowledge, execution, stateChanges, rollbackScript });
  }

  private async captureState(runId: string): Promise<SystemState | undefined> {
    if (!this.deps.monitor) {
      return undefined;
    }
    try {
      return await this.deps.monitor.capture();
    } catch (error) {
      this.deps.logger.warn('System state capture failed, continuing without change tracking', { runId }, error);
      return undefined;
    }
  }

  private async record(outcome: PipelineOutcome): Promise<void> {
    if (!this.deps.history) {
      return;
    }
    await this.deps.history.record({
      runId: outcome.runId,
      problemHtml: outcome.problem.html,
      status: outcome.status,
      wellFormed: outcome.wellFormed,
      safetyPassed: outcome.safety?.passed ?? false,
      violationCount: outcome.safety?.violations.length ?? 0,
      riskLevel: outcome.safety?.riskLevel,
      executed: outcome.execution !== undefined,
      exitCode: outcome.execution?.exitCode,
      restorePointId: outcome.execution?.restorePointId,
      startedAt: outcome.startedAt,
      finishedAt: outcome.finishedAt
    });
  }
}
