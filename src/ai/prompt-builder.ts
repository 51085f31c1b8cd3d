import { ModelRequest, TelemetrySnapshot, TelemetryFields } from '../types';
import { describeOutputStructure, neutralizeSentinels } from './response-contract';

export const DEFAULT_PROBLEM_TEXT = 'General Health Check';

const ROLE = 'ROLE: Senior Windows Systems Engineer & Security Analyst.';
const CONTEXT = 'CONTEXT: User is reporting system issues. Telemetry data is attached.';

const TASK = `TASK:
1. ANALYZE: Correlate user report with system metrics.
2. AUDIT: Review process list for anomalies (resource leaks, unknown binaries, potential malware).
3. REPORT: Generate a technical diagnosis in HTML format.
4. REMEDIATION: Generate a PowerShell script to resolve identified issues.

   POWERSHELL SCRIPT REQUIREMENTS:
   - An administrator privilege check is prepended automatically; do not write your own.
   - Use 'Write-Host' for all logging with color coding
   - When using variables followed by colons, wrap in $(): e.g., "$($path):" not "$path:"
   - Before stopping, disabling or restarting a service, check it exists with Get-Service -Name <name> -ErrorAction SilentlyContinue
   - All service operations and cache clears must use -ErrorAction SilentlyContinue
   - Recursive deletes are only allowed under $env:TEMP, C:\\Windows\\Temp, C:\\Windows\\Prefetch and Windows log directories
   - Operations must be non-destructive (no data loss)
   - Include Try/Catch blocks for critical operations; never suppress errors on Checkpoint-Computer`;

const EXAMPLE_ANALYSIS = `
<h3>Maintenance Report: Operations Completed</h3>
<p>List completed actions using [FIXED], [CLEANED], [DISABLED] tags in past tense.</p>
<ul>
    <li>[FIXED] Disabled crashing Intel service (esrv_svc)</li>
    <li>[CLEANED] Removed temporary files from system cache</li>
</ul>

<h3>Manual Attention Required</h3>
<p>Items that require user intervention or cannot be automated.</p>
<ul>
    <li>Update graphics driver manually from manufacturer website</li>
</ul>`;

const EXAMPLE_FIX = `
Write-Host "Initializing remediation protocols..." -ForegroundColor Cyan

$intelServices = @('esrv_svc', 'SurSvc', 'esrv')
foreach ($svc in $intelServices) {
    $service = Get-Service -Name $svc -ErrorAction SilentlyContinue
    if ($service) {
        Write-Host "Found Intel service: $($svc)" -ForegroundColor Yellow
        Stop-Service -Name $svc -Force -ErrorAction SilentlyContinue
        Set-Service -Name $svc -StartupType Disabled -ErrorAction SilentlyContinue
        Write-Host "Disabled: $($svc)" -ForegroundColor Green
    }
}

Remove-Item -Path "$env:TEMP\\*" -Recurse -Force -ErrorAction SilentlyContinue`;

export interface PromptBuilderOptions {
  /** Telemetry categories to include, in order. Absent categories are skipped. */
  categories: readonly string[];
}

/**
 * Renders telemetry and the user's problem into the model request.
 * Pure: the same inputs always produce the same request text.
 */
export class PromptBuilder {
  private categories: readonly string[];

  constructor(options: PromptBuilderOptions) {
    this.categories = [...options.categories];
  }

  build(snapshot: TelemetrySnapshot, userText: string): ModelRequest {
    const included: Record<string, TelemetryFields> = {};
    const categories: string[] = [];

    for (const category of this.categories) {
      const fields = Object.prototype.hasOwnProperty.call(snapshot, category) ? snapshot[category] : undefined;
      if (fields) {
        included[category] = fields;
        categories.push(category);
      }
    }

    const problem = userText.trim().length > 0 ? userText : DEFAULT_PROBLEM_TEXT;

    const text = [
      ROLE,
      CONTEXT,
      '',
      TASK,
      '',
      'OUTPUT STRUCTURE:',
      '',
      describeOutputStructure({ analysis: EXAMPLE_ANALYSIS, fix: EXAMPLE_FIX }),
      '',
      `USER COMPLAINT: ${neutralizeSentinels(JSON.stringify(problem))}`,
      'TELEMETRY:',
      neutralizeSentinels(JSON.stringify(included, null, 2))
    ].join('\n');

    return { text, categories };
  }
}
