import { spawn } from 'child_process';
import { LoggerLike } from '../common/logger';

export interface ProcessOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Runs PowerShell in a fresh child process. Implementations resolve with the
 * outcome; a launch failure is an outcome too (exit code -1).
 */
export interface ScriptRunner {
  runFile(filePath: string, timeoutMs: number): Promise<ProcessOutcome>;
  runCommand(script: string, timeoutMs: number): Promise<ProcessOutcome>;
}

const BASE_ARGS = ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass'];

// Captured output beyond this is cut
const MAX_OUTPUT_CHARS = 1_000_000;

/** -EncodedCommand takes base64 of UTF-16LE text */
export function encodePowerShellCommand(script: string): string {
  return Buffer.from(script, 'utf16le').toString('base64');
}

function append(buffer: string, chunk: string): string {
  if (buffer.length >= MAX_OUTPUT_CHARS) {
    return buffer;
  }
  return (buffer + chunk).slice(0, MAX_OUTPUT_CHARS);
}

export class PowerShellRunner implements ScriptRunner {
  private logger: LoggerLike;
  private executable: string;

  constructor(logger: LoggerLike, executable: string = 'powershell.exe') {
    this.logger = logger;
    this.executable = executable;
  }

  runFile(filePath: string, timeoutMs: number): Promise<ProcessOutcome> {
    return this.spawnProcess([...BASE_ARGS, '-File', filePath], timeoutMs);
  }

  runCommand(script: string, timeoutMs: number): Promise<ProcessOutcome> {
    return this.spawnProcess([...BASE_ARGS, '-EncodedCommand', encodePowerShellCommand(script)], timeoutMs);
  }

  private spawnProcess(args: string[], timeoutMs: number): Promise<ProcessOutcome> {
    return new Promise(resolve => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;

      // No shell: arguments are passed as-is
      const child = spawn(this.executable, args, { shell: false, windowsHide: true });

      const timer = setTimeout(() => {
        timedOut = true;
        this.logger.warn('PowerShell process timed out, terminating', { timeoutMs });
        child.kill();
      }, timeoutMs);

      const finish = (outcome: ProcessOutcome): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(outcome);
      };

      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdout = append(stdout, chunk);
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr = append(stderr, chunk);
      });

      child.on('error', (error: Error) => {
        this.logger.error('Failed to launch PowerShell', error);
        finish({ exitCode: -1, stdout, stderr: stderr + error.message, timedOut });
      });

      child.on('close', (code: number | null) => {
        finish({ exitCode: code ?? -1, stdout, stderr, timedOut });
      });
    });
  }
}
