import { LoggerLike } from '../common/logger';
import { sanitizeScript } from '../remediation/script-sanitizer';
import { ScriptRunner } from './script-runner';

export interface ServiceState {
  status: string;
  startType: string;
}

/** A part that could not be read is null and is left out of the comparison */
export interface SystemState {
  capturedAt: string;
  services: Record<string, ServiceState> | null;
  /** Startup command name to command line */
  startupItems: Record<string, string> | null;
  /** Registry key to its value names and values */
  registry: Record<string, Record<string, string>> | null;
}

export type StateChange =
  | { kind: 'service'; name: string; before: ServiceState | null; after: ServiceState }
  | { kind: 'startup-added' | 'startup-removed'; name: string; command: string }
  | { kind: 'registry'; key: string; value: string; before: string | null; after: string | null };

export const WATCHED_REGISTRY_KEYS: readonly string[] = [
  'HKLM:\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Run',
  'HKCU:\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Run'
];

const SERVICES_QUERY =
  "Get-Service | Select-Object Name, @{N='Status';E={\"$($_.Status)\"}}, @{N='StartType';E={\"$($_.StartType)\"}}";
const STARTUP_QUERY = 'Get-CimInstance Win32_StartupCommand | Select-Object Name, Command';
const registryQuery = (key: string): string =>
  `Get-ItemProperty -Path '${key}' -ErrorAction Stop | Select-Object * -ExcludeProperty PS*`;

// Registry values are compared and shown up to this length
const MAX_VALUE_CHARS = 100;

const RESTORABLE_START_TYPES = new Set(['Automatic', 'Manual', 'Disabled']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** ConvertTo-Json writes a single object for one row and an array for several */
function rows(value: unknown): Record<string, unknown>[] {
  const items = Array.isArray(value) ? value : [value];
  return items.filter(isRecord);
}

const text = (value: unknown): string => (value === null || value === undefined ? '' : String(value));

export function parseServices(value: unknown): Record<string, ServiceState> {
  const services: Record<string, ServiceState> = {};
  for (const row of rows(value)) {
    const name = text(row.Name);
    if (name.length > 0) {
      services[name] = { status: text(row.Status), startType: text(row.StartType) };
    }
  }
  return services;
}

export function parseStartupItems(value: unknown): Record<string, string> {
  const items: Record<string, string> = {};
  for (const row of rows(value)) {
    const name = text(row.Name);
    if (name.length > 0) {
      items[name] = text(row.Command);
    }
  }
  return items;
}

export function parseRegistryValues(value: unknown): Record<string, string> {
  const values: Record<string, string> = {};
  for (const row of rows(value)) {
    for (const [name, item] of Object.entries(row)) {
      values[name] = text(item).slice(0, MAX_VALUE_CHARS);
    }
  }
  return values;
}

/**
 * Captures the parts of system state a remediation script is most likely to
 * touch: services, startup commands and the Run keys.
 */
export class SystemStateMonitor {
  private runner: ScriptRunner;
  private queryTimeoutMs: number;
  private logger: LoggerLike;
  private clock: () => Date;

  constructor(runner: ScriptRunner, queryTimeoutMs: number, logger: LoggerLike, clock: () => Date = () => new Date()) {
    this.runner = runner;
    this.queryTimeoutMs = queryTimeoutMs;
    this.logger = logger;
    this.clock = clock;
  }

  async capture(): Promise<SystemState> {
    const [services, startupItems, registry] = await Promise.all([
      this.query('services', SERVICES_QUERY, parseServices),
      this.query('startup', STARTUP_QUERY, parseStartupItems),
      this.captureRegistry()
    ]);
    return { capturedAt: this.clock().toISOString(), services, startupItems, registry };
  }

  private async captureRegistry(): Promise<Record<string, Record<string, string>> | null> {
    const keys: Record<string, Record<string, string>> = {};
    for (const key of WATCHED_REGISTRY_KEYS) {
      const values = await this.query(key, registryQuery(key), parseRegistryValues);
      if (values === null) {
        return null;
      }
      keys[key] = values;
    }
    return keys;
  }

  private async query<T>(label: string, script: string, parse: (value: unknown) => T): Promise<T | null> {
    const outcome = await this.runner.runCommand(`${script} | ConvertTo-Json -Depth 3 -Compress`, this.queryTimeoutMs);
    if (outcome.exitCode !== 0) {
      this.logger.warn('System state query failed, leaving it out of the comparison', {
        part: label,
        exitCode: outcome.exitCode,
        timedOut: outcome.timedOut
      });
      return null;
    }
    const output = outcome.stdout.trim();
    if (output.length === 0) {
      return parse(null);
    }
    try {
      const parsed: unknown = JSON.parse(output);
      return parse(parsed);
    } catch (error) {
      this.logger.warn('System state query returned unreadable output', { part: label }, error);
      return null;
    }
  }
}

export function detectStateChanges(before: SystemState, after: SystemState): StateChange[] {
  const changes: StateChange[] = [];

  if (before.services && after.services) {
    for (const [name, state] of Object.entries(after.services)) {
      const previous = before.services[name];
      if (!previous) {
        changes.push({ kind: 'service', name, before: null, after: state });
      } else if (previous.status !== state.status || previous.startType !== state.startType) {
        changes.push({ kind: 'service', name, before: previous, after: state });
      }
    }
  }

  if (before.startupItems && after.startupItems) {
    const previous = before.startupItems;
    const current = after.startupItems;
    for (const [name, command] of Object.entries(current)) {
      if (previous[name] !== command) {
        changes.push({ kind: 'startup-added', name, command });
      }
    }
    for (const [name, command] of Object.entries(previous)) {
      if (current[name] !== command) {
        changes.push({ kind: 'startup-removed', name, command });
      }
    }
  }

  if (before.registry && after.registry) {
    for (const key of Object.keys(after.registry)) {
      const previous = before.registry[key] ?? {};
      const current = after.registry[key];
      const names = new Set([...Object.keys(previous), ...Object.keys(current)]);
      for (const value of names) {
        const was = previous[value] ?? null;
        const now = current[value] ?? null;
        if (was !== now) {
          changes.push({ kind: 'registry', key, value, before: was, after: now });
        }
      }
    }
  }

  return changes;
}

export function formatStateChange(change: StateChange): string {
  switch (change.kind) {
    case 'service':
      return change.before
        ? `Service ${change.name}: ${change.before.status}/${change.before.startType} -> ${change.after.status}/${change.after.startType}`
        : `Service ${change.name} added (${change.after.status}/${change.after.startType})`;
    case 'startup-added':
      return `Startup item added: ${change.name} (${change.command})`;
    case 'startup-removed':
      return `Startup item removed: ${change.name} (${change.command})`;
    case 'registry':
      return `Registry ${change.key}\\${change.value}: ${change.before ?? '(none)'} -> ${change.after ?? '(none)'}`;
  }
}

export function formatStateChanges(changes: readonly StateChange[]): string {
  if (changes.length === 0) {
    return 'No system changes detected.';
  }
  return changes.map(change => `- ${formatStateChange(change)}`).join('\n');
}

const quoteLiteral = (value: string): string => `'${value.replace(/'/g, "''")}'`;

// Comment text must not end in a line continuation or open a block comment
const commentText = (value: string): string => value.replace(/[\u0000-\u001f\u007f`]|<#|#>/g, ' ');

/**
 * Script that puts changed services back to their recorded start type and
 * status. Startup and registry changes are listed for manual review only.
 * The result carries the elevation guard like any other remediation script.
 */
export function generateRollbackScript(changes: readonly StateChange[], generatedAt: string): string {
  const lines = [`# Rollback for remediation changes observed ${commentText(generatedAt)}`];

  for (const change of changes) {
    if (change.kind !== 'service' || !change.before) {
      continue;
    }
    const name = quoteLiteral(change.name);
    lines.push('', `$svc = Get-Service -Name ${name} -ErrorAction SilentlyContinue`, 'if ($svc) {');
    if (RESTORABLE_START_TYPES.has(change.before.startType)) {
      lines.push(`  Set-Service -Name ${name} -StartupType ${change.before.startType} -ErrorAction SilentlyContinue`);
    }
    lines.push(change.before.status === 'Running'
      ? `  Start-Service -Name ${name} -ErrorAction SilentlyContinue`
      : `  Stop-Service -Name ${name} -Force -ErrorAction SilentlyContinue`);
    lines.push('}');
  }

  const manual = changes.filter(change => change.kind !== 'service');
  if (manual.length > 0) {
    lines.push('', '# Review manually:');
    for (const change of manual) {
      lines.push(`# ${commentText(formatStateChange(change))}`);
    }
  }

  return sanitizeScript(lines.join('\n')).text;
}
