#!/usr/bin/env node
import * as readline from 'readline';
import { getAgentLogger, Logger, parseLogLevel } from './common/logger';
import { AgentConfig, loadConfig, resolveCategories } from './config/config';
import { maskApiKey, resetApiKey, resolveApiKey } from './config/credentials';
import { Database } from './core/database';
import { GeminiClient } from './ai/model-client';
import { ExecutionController } from './execution/execution-controller';
import { RestorePointManager } from './execution/restore-point';
import { PowerShellRunner } from './execution/script-runner';
import { formatStateChange, SystemStateMonitor } from './execution/state-monitor';
import { RunHistory } from './history/run-history';
import { KnowledgeBase, loadKnownSolutions } from './knowledge/knowledge-base';
import { ConfirmationRequest, DiagnosticPipeline, PipelineOutcome } from './pipeline/diagnostic-pipeline';
import { formatDryRunSummary } from './remediation/dry-run';
import { sanitizeTelemetry } from './report/report-sanitizer';
import { VerificationReporter } from './report/verification-reporter';
import { createDefaultProbes, TelemetryCollector } from './telemetry/telemetry-collector';
import { ScanMode } from './types';

interface CliOptions {
  configPath?: string;
  apiKey?: string;
  scanMode?: ScanMode;
  resetKey: boolean;
  showHistory: boolean;
  noExecute: boolean;
  problem: string;
}

const USAGE = `Usage: remedy-agent [options] [problem description...]

Options:
  --config <path>     Config file (default ./remedy.config.json)
  --api-key <key>     API key for this run; takes precedence over GEMINI_API_KEY and the key file
  --scan <mode>       quick | deep | complete
  --no-execute        Diagnose only; never run the remediation script
  --reset-key         Delete the stored API key and exit
  --history           Show recent runs and exit
  -h, --help          Show this help`;

export function parseCliArgs(argv: readonly string[]): CliOptions | null {
  const options: CliOptions = { resetKey: false, showHistory: false, noExecute: false, problem: '' };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-h':
      case '--help':
        return null;
      case '--config':
        options.configPath = argv[++i];
        break;
      case '--api-key':
        options.apiKey = argv[++i];
        break;
      case '--scan': {
        const mode = argv[++i];
        if (mode !== 'quick' && mode !== 'deep' && mode !== 'complete') {
          return null;
        }
        options.scanMode = mode;
        break;
      }
      case '--reset-key':
        options.resetKey = true;
        break;
      case '--history':
        options.showHistory = true;
        break;
      case '--no-execute':
        options.noExecute = true;
        break;
      default:
        words.push(arg);
    }
  }

  options.problem = words.join(' ');
  return options;
}

function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise(resolve => {
    rl.question(question, answer => {
      rl.close();
      resolve(answer);
    });
  });
}

async function confirmExecution(request: ConfirmationRequest): Promise<boolean> {
  console.log('\n--- Remediation script (sanitized) ---\n');
  console.log(request.script.text);
  console.log('\n' + formatDryRunSummary(request.dryRun));
  console.log(`Advisory risk: ${request.safety.riskLevel} (score ${request.safety.riskScore})`);
  if (request.knowledge) {
    console.log(`Known solutions: ${request.knowledge.reason}`);
  }
  console.log('');
  const answer = await ask('Run this script now? A restore point is created first. [y/N] ');
  return /^y(es)?$/i.test(answer.trim());
}

class RemedyAgent {
  private config: AgentConfig;
  private logger: Logger;
  private db: Database;
  private history: RunHistory;

  constructor(config: AgentConfig) {
    this.config = config;
    this.logger = getAgentLogger(config.logging.logDir, parseLogLevel(config.logging.level));
    this.db = new Database(config.historyDbPath, this.logger);
    this.history = new RunHistory(this.db, this.logger);
  }

  async showHistory(): Promise<void> {
    const [summary, runs] = await Promise.all([this.history.summary(), this.history.recent(10)]);
    console.log(`Runs: ${summary.total}  executed: ${summary.executed}  blocked: ${summary.blocked}  failed: ${summary.failed}`);
    for (const run of runs) {
      const exit = run.exitCode === undefined ? '' : ` exit=${run.exitCode}`;
      console.log(`${run.startedAt}  ${run.status.padEnd(14)}${exit}  violations=${run.violationCount}`);
    }
  }

  async diagnose(problem: string, noExecute: boolean, apiKey?: string): Promise<PipelineOutcome> {
    this.logger.startOperation('diagnose', { scanMode: this.config.telemetry.scanMode });

    const credential = await resolveApiKey(
      {
        explicitKey: apiKey,
        env: process.env,
        keyFile: this.config.keyFile,
        prompt: async () => ask('Enter Google Gemini API key: '),
        persistPrompted: true
      },
      this.logger
    );
    this.logger.info('Using API key', { source: credential.source, key: maskApiKey(credential.apiKey) });

    const runner = new PowerShellRunner(this.logger);
    const categories = resolveCategories(this.config.telemetry);
    const collector = new TelemetryCollector(
      createDefaultProbes(runner, this.config.telemetry.probeTimeoutMs),
      { categories, probeTimeoutMs: this.config.telemetry.probeTimeoutMs },
      this.logger
    );

    console.log(`Collecting telemetry (${this.config.telemetry.scanMode} scan)...`);
    const snapshot = await collector.collect();

    const pipeline = new DiagnosticPipeline(
      {
        transport: new GeminiClient({ apiKey: credential.apiKey, config: this.config.model }, this.logger),
        executor: new ExecutionController(
          runner,
          new RestorePointManager(runner, this.logger),
          {
            workDir: this.config.execution.workDir,
            scriptTimeoutMs: this.config.execution.scriptTimeoutMs,
            createRestorePoint: this.config.execution.createRestorePoint,
            requireRestorePoint: this.config.execution.requireRestorePoint
          },
          this.logger
        ),
        history: this.history,
        // State queries are PowerShell only
        monitor: process.platform === 'win32'
          ? new SystemStateMonitor(runner, this.config.telemetry.probeTimeoutMs, this.logger)
          : undefined,
        knowledge: new KnowledgeBase(loadKnownSolutions(this.logger)),
        logger: this.logger
      },
      {
        categories,
        modelTimeoutMs: this.config.model.timeoutMs,
        executionEnabled: this.config.execution.enabled && !noExecute
      }
    );

    console.log('Requesting AI diagnosis...');
    const outcome = await pipeline.run(problem, snapshot, confirmExecution);

    const reporter = new VerificationReporter(this.config.reporting.reportDir, this.logger);
    const { html } = reporter.render({
      problem: outcome.problem,
      analysis: outcome.analysis,
      execution: outcome.executionReport,
      telemetry: sanitizeTelemetry(snapshot),
      notices: outcome.notices,
      stateChanges: outcome.verification.stateChanges
    });
    const reportPath = reporter.writeReport(html);

    console.log(`\nStatus: ${outcome.status}`);
    if (outcome.execution) {
      console.log(`Exit code: ${outcome.execution.exitCode}`);
    }
    for (const violation of outcome.safety?.violations ?? []) {
      console.log(`  line ${violation.lineNumber} [${violation.rule}] ${violation.detail}`);
    }
    for (const change of outcome.stateChanges ?? []) {
      console.log(`  changed: ${formatStateChange(change)}`);
    }
    if (outcome.rollbackScript) {
      console.log(`Rollback script: ${reporter.writeRollbackScript(outcome.rollbackScript)}`);
    }
    console.log(`Report: ${reportPath}`);

    this.logger.endOperation('diagnose', outcome.status !== 'blocked', { status: outcome.status, reportPath });
    return outcome;
  }

  async stop(): Promise<void> {
    await this.db.close();
  }
}

async function main(argv: readonly string[]): Promise<number> {
  const options = parseCliArgs(argv);
  if (!options) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(options.configPath);
  if (options.scanMode) {
    config.telemetry.scanMode = options.scanMode;
  }

  const agent = new RemedyAgent(config);
  try {
    if (options.resetKey) {
      resetApiKey(config.keyFile, getAgentLogger(config.logging.logDir));
      console.log('API key reset.');
      return 0;
    }
    if (options.showHistory) {
      await agent.showHistory();
      return 0;
    }
    const outcome = await agent.diagnose(options.problem, options.noExecute, options.apiKey);
    return outcome.status === 'executed' && outcome.execution?.exitCode !== 0 ? 1 : 0;
  } finally {
    await agent.stop();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => process.exit(code),
    (error: unknown) => {
      console.error('Fatal error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  );
}
