import * as os from 'os';
import { LoggerLike } from '../common/logger';
import { ScriptRunner } from '../execution/script-runner';
import { TelemetryFields, TelemetrySnapshot, TelemetryValue } from '../types';

export type TelemetryProbe = () => Promise<TelemetryFields>;

export type ProbeSet = Readonly<Record<string, TelemetryProbe>>;

export interface TelemetryCollectorOptions {
  categories: readonly string[];
  probeTimeoutMs: number;
}

/** Converts parsed JSON into telemetry values; anything else becomes a string */
export function toTelemetryValue(value: unknown): TelemetryValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toTelemetryValue);
  }
  if (typeof value === 'object') {
    const fields: Record<string, TelemetryValue> = {};
    for (const [key, item] of Object.entries(value)) {
      fields[key] = toTelemetryValue(item);
    }
    return fields;
  }
  return value === undefined ? null : String(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
  }
  return value;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} probe timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

/**
 * Runs the configured category probes concurrently and returns one frozen
 * snapshot after all have settled. A failed probe is recorded under its
 * category as { error }.
 */
export class TelemetryCollector {
  private probes: ProbeSet;
  private options: TelemetryCollectorOptions;
  private logger: LoggerLike;

  constructor(probes: ProbeSet, options: TelemetryCollectorOptions, logger: LoggerLike) {
    this.probes = probes;
    this.options = options;
    this.logger = logger;
  }

  async collect(): Promise<TelemetrySnapshot> {
    const categories = this.options.categories.filter(category => {
      const available = Object.prototype.hasOwnProperty.call(this.probes, category);
      if (!available) {
        this.logger.debug('No telemetry probe for category on this platform', { category });
      }
      return available;
    });

    const operationStart = Date.now();
    const settled = await Promise.allSettled(
      categories.map(category => withTimeout(this.probes[category](), this.options.probeTimeoutMs, category))
    );

    const snapshot: Record<string, TelemetryFields> = {};
    settled.forEach((result, index) => {
      const category = categories[index];
      if (result.status === 'fulfilled') {
        snapshot[category] = result.value;
      } else {
        const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
        this.logger.warn('Telemetry probe failed, continuing with partial data', { category, error: message });
        snapshot[category] = { error: message };
      }
    });

    this.logger.info('Telemetry collected', {
      categories: categories.length,
      failed: settled.filter(result => result.status === 'rejected').length,
      durationMs: Date.now() - operationStart
    });

    return deepFreeze(snapshot);
  }
}

// ===========================================
// BUILT-IN PROBES
// ===========================================

const GB = 1024 ** 3;

const round = (value: number, digits: number = 1): number => Number(value.toFixed(digits));

function sampleCpuTimes(): { idle: number; total: number } {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const { user, nice, sys, irq } = cpu.times;
    idle += cpu.times.idle;
    total += user + nice + sys + irq + cpu.times.idle;
  }
  return { idle, total };
}

export async function probeSystem(): Promise<TelemetryFields> {
  const cpus = os.cpus();
  return {
    OS: `${os.type()} ${os.release()} ${os.version()}`,
    Architecture: os.arch(),
    'Boot Time': new Date(Date.now() - os.uptime() * 1000).toISOString(),
    'Uptime Hours': round(os.uptime() / 3600),
    'CPU Context': `${cpus.length} Threads`,
    'CPU Model': cpus[0]?.model ?? 'Unknown'
  };
}

export async function probePerformance(sampleMs: number = 500): Promise<TelemetryFields> {
  const before = sampleCpuTimes();
  await new Promise(resolve => setTimeout(resolve, sampleMs));
  const after = sampleCpuTimes();

  const totalDelta = after.total - before.total;
  const usage = totalDelta > 0 ? (1 - (after.idle - before.idle) / totalDelta) * 100 : 0;
  const total = os.totalmem();
  const free = os.freemem();

  return {
    'Overall Usage': `${round(usage)}%`,
    'Load Average': os.loadavg().map(value => round(value, 2)),
    'Memory Total': `${round(total / GB)} GB`,
    'Memory Available': `${round(free / GB)} GB`,
    'Memory Used': `${round((total - free) / GB)} GB (${round(((total - free) / total) * 100)}%)`
  };
}

/** PowerShell queries per category; each field is one query */
const WINDOWS_QUERIES: Readonly<Record<string, Readonly<Record<string, string>>>> = {
  network: {
    'Active Interfaces': "Get-NetAdapter | Where-Object Status -eq 'Up' | Select-Object Name, InterfaceDescription, LinkSpeed",
    'DNS Config': 'Get-DnsClientServerAddress | Where-Object ServerAddresses -ne $null | Select-Object InterfaceAlias, ServerAddresses'
  },
  security: {
    Antivirus: 'Get-MpComputerStatus | Select-Object AntivirusEnabled, RealTimeProtectionEnabled, DefenderSignaturesOutOfDate',
    'Firewall Profiles': 'Get-NetFirewallProfile | Select-Object Name, Enabled',
    'Last Updates': 'Get-HotFix | Sort-Object InstalledOn -Descending | Select-Object -First 5 HotFixID, InstalledOn'
  },
  events: {
    'Critical Events': "Get-WinEvent -FilterHashtable @{LogName='System';Level=1,2;StartTime=(Get-Date).AddHours(-24)} -MaxEvents 15 -ErrorAction SilentlyContinue | Select-Object TimeCreated, Message"
  },
  bluetooth: {
    Devices: 'Get-PnpDevice -Class Bluetooth | Select-Object FriendlyName, Status, Class | Sort-Object Status',
    'Radio State': "Get-NetAdapter | Where-Object InterfaceDescription -like '*Bluetooth*' | Select-Object Name, Status"
  },
  processes: {
    'Top CPU': 'Get-Process | Sort-Object CPU -Descending | Select-Object -First 30 Name, Id, CPU, @{N="MemMB";E={[math]::Round($_.WorkingSet64/1MB,1)}}, Path'
  },
  disk: {
    'Physical Drives (SMART)': 'Get-PhysicalDisk | Select-Object FriendlyName, MediaType, HealthStatus, OperationalStatus, Size',
    Partitions: 'Get-Volume | Where-Object DriveLetter -ne $null | Select-Object DriveLetter, FileSystemLabel, SizeRemaining, Size'
  },
  gpu: {
    Controllers: 'Get-CimInstance Win32_VideoController | Select-Object Name, DriverVersion, VideoProcessor, AdapterRAM'
  },
  startup: {
    'Startup Apps': 'Get-CimInstance Win32_StartupCommand | Select-Object Name, Command, Location, User',
    'Failed Services': "Get-Service | Where-Object {$_.Status -eq 'Stopped' -and $_.StartType -eq 'Automatic'} | Select-Object Name, DisplayName"
  }
};

export function windowsProbe(runner: ScriptRunner, queries: Readonly<Record<string, string>>, timeoutMs: number): TelemetryProbe {
  return async () => {
    const names = Object.keys(queries);
    const results = await Promise.allSettled(
      names.map(async name => {
        const outcome = await runner.runCommand(`${queries[name]} | ConvertTo-Json -Depth 3 -Compress`, timeoutMs);
        if (outcome.exitCode !== 0) {
          throw new Error(outcome.stderr.trim() || `exit code ${outcome.exitCode}`);
        }
        const text = outcome.stdout.trim();
        return text.length > 0 ? toTelemetryValue(JSON.parse(text)) : null;
      })
    );

    const fields: Record<string, TelemetryValue> = {};
    results.forEach((result, index) => {
      fields[names[index]] = result.status === 'fulfilled'
        ? result.value
        : `N/A (${result.reason instanceof Error ? result.reason.message : String(result.reason)})`;
    });
    return fields;
  };
}

/** os-based probes everywhere; PowerShell probes on Windows only */
export function createDefaultProbes(runner: ScriptRunner, queryTimeoutMs: number, platform: NodeJS.Platform = process.platform): ProbeSet {
  const probes: Record<string, TelemetryProbe> = {
    system: probeSystem,
    performance: () => probePerformance()
  };

  if (platform === 'win32') {
    for (const [category, queries] of Object.entries(WINDOWS_QUERIES)) {
      probes[category] = windowsProbe(runner, queries, queryTimeoutMs);
    }
  }

  return probes;
}
