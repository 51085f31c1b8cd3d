// Type definitions

// ===========================================
// TELEMETRY
// ===========================================

export type TelemetryValue =
  | string
  | number
  | boolean
  | null
  | readonly TelemetryValue[]
  | { readonly [field: string]: TelemetryValue };

export type TelemetryFields = Readonly<Record<string, TelemetryValue>>;

/**
 * Category name ("system", "performance", "services", ...) to field/value pairs.
 * Built once per run by the collector, frozen, and only read afterwards.
 */
export type TelemetrySnapshot = Readonly<Record<string, TelemetryFields>>;

export type ScanMode = 'quick' | 'deep' | 'complete';

// ===========================================
// MODEL EXCHANGE
// ===========================================

export interface ModelRequest {
  readonly text: string;
  readonly categories: readonly string[];
}

/** Untrusted model output. Empty when the call failed or timed out. */
export type ModelResponse = string;

export interface ParsedDiagnosis {
  readonly analysisText: string;
  readonly rawScript: string;
  readonly wellFormed: boolean;
}

// ===========================================
// SCRIPT SAFETY
// ===========================================

export interface ScriptRewrite {
  rule: string;
  line: number;
  before: string;
  after: string;
}

export interface SanitizedScript {
  readonly text: string;
  readonly guardInjected: boolean;
  readonly rewrites: readonly ScriptRewrite[];
}

export type SafetyRule =
  | 'elevation-guard'
  | 'service-existence-check'
  | 'destructive-filesystem'
  | 'missing-error-suppression'
  | 'critical-error-suppressed'
  | 'blocked-command'
  | 'download-execute';

export interface SafetyViolation {
  rule: SafetyRule;
  lineNumber: number;
  offendingLine: string;
  detail: string;
}

export type RiskLevel = 'NONE' | 'VERY LOW' | 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface SafetyReport {
  readonly passed: boolean;
  readonly violations: readonly SafetyViolation[];
  /** Digest of the exact sanitized text this report approves or rejects */
  readonly scriptDigest: string;
  readonly riskScore: number;
  readonly riskLevel: RiskLevel;
}

export type DryRunChangeKind = 'service' | 'file' | 'registry' | 'process' | 'network';

export interface DryRunChange {
  kind: DryRunChangeKind;
  action: string;
  target: string;
}

export interface DryRunSummary {
  readonly changes: readonly DryRunChange[];
  readonly totalChanges: number;
  readonly estimatedRisk: RiskLevel;
}

// ===========================================
// EXECUTION
// ===========================================

export interface RestorePointResult {
  created: boolean;
  id?: string;
  description: string;
  error?: string;
}

export interface ExecutionResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly restorePointId?: string;
  readonly restorePointError?: string;
  readonly timedOut: boolean;
}

// ===========================================
// REPORTING
// ===========================================

export type FragmentSource = 'model-text' | 'user-text' | 'process-output' | 'telemetry';

/**
 * Markup that is safe to embed in the diagnostic report. Only the report
 * sanitizer constructs these.
 */
export interface SanitizedReportFragment {
  readonly source: FragmentSource;
  readonly html: string;
}

export interface ExecutionReportFragment {
  readonly exitCode: number;
  readonly succeeded: boolean;
  readonly timedOut: boolean;
  readonly stdout: SanitizedReportFragment;
  readonly stderr: SanitizedReportFragment;
  readonly restorePoint: SanitizedReportFragment;
  readonly startedAt: SanitizedReportFragment;
  readonly finishedAt: SanitizedReportFragment;
}

// ===========================================
// RUN HISTORY
// ===========================================

export type PipelineStatus = 'no-remediation' | 'blocked' | 'declined' | 'executed';

export interface RunRecord {
  runId: string;
  /** Escaped problem text, as embedded in the report */
  problemHtml: string;
  status: PipelineStatus;
  wellFormed: boolean;
  safetyPassed: boolean;
  violationCount: number;
  riskLevel?: RiskLevel;
  executed: boolean;
  exitCode?: number;
  restorePointId?: string;
  startedAt: string;
  finishedAt: string;
}
