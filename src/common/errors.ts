// errors.ts - Failure taxonomy for the diagnosis-to-remediation pipeline
//
// Recoverable conditions (malformed model output, transport failures, partial
// telemetry, failed restore points, nonzero exit codes) are carried as data.
// The classes below are for conditions that abort the current call.

export class RemediationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Execution was requested without a passing SafetyReport for the exact script.
 * A defect in the caller, never a user-facing condition.
 */
export class NotValidatedError extends RemediationError {
  constructor(reason: string) {
    super(`Script has not passed safety validation: ${reason}`);
  }
}

/** A second remediation run was started while one is still in flight. */
export class ExecutionInProgressError extends RemediationError {
  constructor(activeRunId: string) {
    super(`A remediation run is already in progress (${activeRunId})`);
  }
}

/** The model call failed. The pipeline converts this to an empty response. */
export class TransportError extends RemediationError {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, options: { status?: number; retryable?: boolean } = {}) {
    super(message);
    this.status = options.status;
    this.retryable = options.retryable ?? false;
  }
}

/** No usable credential or configuration could be resolved. */
export class ConfigurationError extends RemediationError {}
