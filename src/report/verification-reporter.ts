import * as fs from 'fs';
import * as path from 'path';
import { LoggerLike } from '../common/logger';
import { atomicWriteFileSync } from '../security';
import { ExecutionReportFragment, SanitizedReportFragment } from '../types';

export type RemediationItemStatus = 'completed' | 'pending' | 'manual';

export interface RemediationItem {
  status: RemediationItemStatus;
  /** Sanitized markup of the list item */
  html: string;
  /** Set when a completed item was demoted because the run failed */
  demoted: boolean;
}

export type ExecutionStatus = 'not-run' | 'succeeded' | 'failed';

export interface VerificationInput {
  problem: SanitizedReportFragment;
  analysis: SanitizedReportFragment;
  execution?: ExecutionReportFragment;
  telemetry?: ReadonlyArray<{ category: SanitizedReportFragment; body: SanitizedReportFragment }>;
  /** Escaped one-line notes, e.g. safety violations */
  notices?: readonly SanitizedReportFragment[];
  /** Escaped descriptions of what changed during execution; absent when not tracked */
  stateChanges?: readonly SanitizedReportFragment[];
}

export interface VerificationReport {
  executionStatus: ExecutionStatus;
  items: RemediationItem[];
  stateChanges?: readonly SanitizedReportFragment[];
}

const COMPLETION_TAG = /\[(?:FIXED|CLEANED|DISABLED)\]/i;
const MANUAL_HEADING = /<h[1-6][^>]*>[^<]*Manual Attention Required[^<]*<\/h[1-6]>/i;
const NEXT_HEADING = /<h[1-6][\s>]/i;
const LIST_ITEM = /<li\b[^>]*>([\s\S]*?)<\/li>/gi;

function listItems(html: string): string[] {
  const items: string[] = [];
  for (const match of html.matchAll(LIST_ITEM)) {
    const item = match[1].replace(/^(?:\s|<br>)+|(?:\s|<br>)+$/g, '');
    if (item.length > 0) {
      items.push(item);
    }
  }
  return items;
}

/** Splits the analysis into the completed-work items and the manual-attention items */
export function extractRemediationItems(analysisHtml: string): { completed: string[]; manual: string[] } {
  const heading = analysisHtml.match(MANUAL_HEADING);
  if (!heading || heading.index === undefined) {
    return { completed: listItems(analysisHtml).filter(item => COMPLETION_TAG.test(item)), manual: [] };
  }

  const before = analysisHtml.slice(0, heading.index);
  let section = analysisHtml.slice(heading.index + heading[0].length);
  let after = '';
  const next = section.match(NEXT_HEADING);
  if (next && next.index !== undefined) {
    after = section.slice(next.index);
    section = section.slice(0, next.index);
  }

  return {
    completed: listItems(before + after).filter(item => COMPLETION_TAG.test(item)),
    manual: listItems(section)
  };
}

function executionStatus(execution: ExecutionReportFragment | undefined): ExecutionStatus {
  if (!execution) {
    return 'not-run';
  }
  return execution.succeeded ? 'succeeded' : 'failed';
}

/**
 * Completed items count as done only after a successful run. Without a run
 * they are pending; after a failed run they require manual attention.
 */
export function buildVerificationReport(input: VerificationInput): VerificationReport {
  const { completed, manual } = extractRemediationItems(input.analysis.html);
  const status = executionStatus(input.execution);

  const items: RemediationItem[] = completed.map(html => {
    if (status === 'succeeded') return { status: 'completed', html, demoted: false };
    if (status === 'failed') return { status: 'manual', html, demoted: true };
    return { status: 'pending', html, demoted: false };
  });

  for (const html of manual) {
    items.push({ status: 'manual', html, demoted: false });
  }

  return input.stateChanges
    ? { executionStatus: status, items, stateChanges: input.stateChanges }
    : { executionStatus: status, items };
}

const CSS = `
:root { --bg: #0d1117; --card: #161b22; --text: #c9d1d9; --accent: #58a6ff; --danger: #f85149; --success: #3fb950; --warn: #d29922; }
body { font-family: 'Segoe UI', system-ui, sans-serif; background: var(--bg); color: var(--text); margin: 0; padding: 20px; }
.container { max-width: 1200px; margin: 0 auto; }
h1 { border-bottom: 2px solid var(--accent); padding-bottom: 10px; color: var(--accent); text-transform: uppercase; letter-spacing: 2px; }
.problem-box { background: rgba(248, 81, 73, 0.1); border-left: 5px solid var(--danger); padding: 20px; margin-bottom: 30px; }
.notice { background: rgba(210, 153, 34, 0.1); border-left: 5px solid var(--warn); padding: 10px 20px; margin-bottom: 10px; }
.ai-analysis { background: #161b22; padding: 30px; border-radius: 12px; border: 1px solid var(--accent); margin-bottom: 30px; line-height: 1.6; }
.status { padding: 20px; border-radius: 8px; margin-bottom: 30px; background: var(--card); border: 1px solid #30363d; }
.status.succeeded { border-color: var(--success); }
.status.failed { border-color: var(--danger); }
li.completed::marker { color: var(--success); }
li.pending::marker { color: var(--warn); }
li.manual::marker { color: var(--danger); }
.raw-data { display: grid; grid-template-columns: repeat(auto-fit, minmax(400px, 1fr)); gap: 20px; }
.data-panel { background: var(--card); padding: 20px; border-radius: 8px; border: 1px solid #30363d; max-height: 300px; overflow-y: auto; }
.data-panel h4 { color: var(--success); border-bottom: 1px solid #30363d; padding-bottom: 10px; margin-top: 0; }
pre { white-space: pre-wrap; font-family: 'Consolas', monospace; font-size: 0.85rem; color: #8b949e; }
`;

const STATUS_HEADINGS: Record<RemediationItemStatus, string> = {
  completed: 'Operations Completed',
  pending: 'Proposed Operations (not executed)',
  manual: 'Manual Attention Required'
};

function renderItems(items: RemediationItem[], status: RemediationItemStatus): string {
  const selected = items.filter(item => item.status === status);
  if (selected.length === 0) {
    return '';
  }
  const rows = selected
    .map(item => `<li class="${status}">${item.demoted ? 'Not confirmed: ' : ''}${item.html}</li>`)
    .join('\n');
  return `<h3>${STATUS_HEADINGS[status]}</h3>\n<ul>\n${rows}\n</ul>`;
}

function renderExecution(execution: ExecutionReportFragment | undefined): string {
  if (!execution) {
    return '<div class="status"><h2>Remediation</h2><p>No remediation script was executed.</p></div>';
  }
  const cls = execution.succeeded ? 'succeeded' : 'failed';
  const outcome = execution.timedOut
    ? 'Timed out'
    : `${execution.succeeded ? 'Succeeded' : 'Failed'} (exit code ${execution.exitCode})`;
  return [
    `<div class="status ${cls}">`,
    `<h2>Remediation: ${outcome}</h2>`,
    `<p>${execution.restorePoint.html}</p>`,
    `<p>Started ${execution.startedAt.html}, finished ${execution.finishedAt.html}</p>`,
    `<h4>Output</h4><pre>${execution.stdout.html}</pre>`,
    execution.stderr.html.length > 0 ? `<h4>Errors</h4><pre>${execution.stderr.html}</pre>` : '',
    '</div>'
  ].join('\n');
}

function renderStateChanges(changes: readonly SanitizedReportFragment[] | undefined): string {
  if (!changes) {
    return '';
  }
  const body = changes.length > 0
    ? `<ul>\n${changes.map(change => `<li>${change.html}</li>`).join('\n')}\n</ul>`
    : '<p>No system changes detected.</p>';
  return `<div class="status">\n<h2>Observed System Changes</h2>\n${body}\n</div>`;
}

/** Standalone HTML document. `generatedAt` is display text chosen by the caller. */
export function renderHtml(input: VerificationInput, report: VerificationReport, generatedAt: string): string {
  const notices = (input.notices ?? []).map(notice => `<div class="notice">${notice.html}</div>`).join('\n');
  const panels = (input.telemetry ?? [])
    .map(panel => `<div class="data-panel">\n<h4>${panel.category.html}</h4>\n<pre>${panel.body.html}</pre>\n</div>`)
    .join('\n');
  const analysis = input.analysis.html.length > 0 ? input.analysis.html : '<p>No AI analysis available.</p>';

  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>AI Diagnostic Report | ${generatedAt}</title>
<style>${CSS}</style>
</head>
<body>
<div class="container">
<h1>System Diagnostic Report <span style="font-size:0.5em; float:right">${generatedAt}</span></h1>
<div class="problem-box">
<h3 style="margin-top:0; color:var(--danger)">REPORTED ISSUE</h3>
<p>"${input.problem.html}"</p>
</div>
${notices}
${renderExecution(input.execution)}
${renderStateChanges(input.stateChanges)}
<div class="status">
${renderItems(report.items, 'completed')}
${renderItems(report.items, 'pending')}
${renderItems(report.items, 'manual')}
</div>
<div class="ai-analysis">
<h2>Analysis</h2>
${analysis}
</div>
<div class="raw-data">
${panels}
</div>
</div>
</body>
</html>
`;
}

const pad = (value: number): string => String(value).padStart(2, '0');

function fileStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function reportFileName(date: Date): string {
  return `Diagnosis_${fileStamp(date)}.html`;
}

export function rollbackFileName(date: Date): string {
  return `Rollback_${fileStamp(date)}.ps1`;
}

export class VerificationReporter {
  private reportDir: string;
  private logger: LoggerLike;

  constructor(reportDir: string, logger: LoggerLike) {
    this.reportDir = reportDir;
    this.logger = logger;
  }

  build(input: VerificationInput): VerificationReport {
    return buildVerificationReport(input);
  }

  render(input: VerificationInput, now: Date = new Date()): { report: VerificationReport; html: string } {
    const report = buildVerificationReport(input);
    const generatedAt = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} ${pad(now.getHours())}:${pad(now.getMinutes())}`;
    return { report, html: renderHtml(input, report, generatedAt) };
  }

  /** Writes the report and returns its path */
  writeReport(html: string, now: Date = new Date()): string {
    fs.mkdirSync(this.reportDir, { recursive: true });
    const filePath = path.join(this.reportDir, reportFileName(now));
    atomicWriteFileSync(filePath, html, 0o644);
    this.logger.info('Diagnostic report written', { filePath });
    return filePath;
  }

  /** Written beside the report for the user to review and run */
  writeRollbackScript(script: string, now: Date = new Date()): string {
    fs.mkdirSync(this.reportDir, { recursive: true });
    const filePath = path.join(this.reportDir, rollbackFileName(now));
    atomicWriteFileSync(filePath, script, 0o644);
    this.logger.info('Rollback script written', { filePath });
    return filePath;
  }
}
