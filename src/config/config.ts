import * as path from 'path';
import { z, safeReadJSONFile } from '../security';
import { LoggerLike } from '../common/logger';
import { ScanMode } from '../types';

export interface ModelConfig {
  name: string;
  endpoint: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface TelemetryConfig {
  scanMode: ScanMode;
  /** Overrides the scan mode's category list when set */
  categories?: string[];
  probeTimeoutMs: number;
}

export interface ExecutionConfig {
  enabled: boolean;
  scriptTimeoutMs: number;
  createRestorePoint: boolean;
  /** When true a failed restore point blocks execution instead of only being reported */
  requireRestorePoint: boolean;
  workDir: string;
}

export interface ReportingConfig {
  reportDir: string;
}

export interface LoggingConfig {
  logDir: string;
  level: string;
}

export interface AgentConfig {
  model: ModelConfig;
  telemetry: TelemetryConfig;
  execution: ExecutionConfig;
  reporting: ReportingConfig;
  logging: LoggingConfig;
  historyDbPath: string;
  keyFile: string;
}

export const SCAN_MODE_CATEGORIES: Readonly<Record<ScanMode, readonly string[]>> = {
  quick: ['system', 'performance'],
  deep: ['system', 'performance', 'network', 'security', 'events', 'bluetooth', 'processes'],
  complete: [
    'system', 'performance', 'network', 'security', 'events', 'bluetooth',
    'processes', 'disk', 'gpu', 'startup'
  ]
};

export const DEFAULT_CONFIG: AgentConfig = {
  model: {
    name: 'gemini-2.5-flash',
    endpoint: 'https://generativelanguage.googleapis.com/v1beta',
    timeoutMs: 120000,
    maxRetries: 3,
    retryDelayMs: 4000
  },
  telemetry: {
    scanMode: 'complete',
    probeTimeoutMs: 30000
  },
  execution: {
    enabled: true,
    scriptTimeoutMs: 600000,
    createRestorePoint: true,
    requireRestorePoint: false,
    workDir: './data/remediation'
  },
  reporting: {
    reportDir: './AI_Reports'
  },
  logging: {
    logDir: './logs',
    level: 'INFO'
  },
  historyDbPath: './data/history.db',
  keyFile: './gemini.key'
};

const ConfigFileSchema = z.object({
  model: z.optional(z.object({
    name: z.optional(z.string().min(1).max(100).regex(/^[A-Za-z0-9.\-_]+$/)),
    endpoint: z.optional(z.string().max(500).regex(/^https?:\/\//)),
    timeoutMs: z.optional(z.number().int().min(1000).max(600000)),
    maxRetries: z.optional(z.number().int().min(0).max(10)),
    retryDelayMs: z.optional(z.number().int().min(0).max(60000))
  })),
  telemetry: z.optional(z.object({
    scanMode: z.optional(z.string().enum(['quick', 'deep', 'complete'])),
    categories: z.optional(z.array(z.string().min(1).max(50).regex(/^[a-z_]+$/)).max(32)),
    probeTimeoutMs: z.optional(z.number().int().min(1000).max(300000))
  })),
  execution: z.optional(z.object({
    enabled: z.optional(z.boolean()),
    scriptTimeoutMs: z.optional(z.number().int().min(1000).max(3600000)),
    createRestorePoint: z.optional(z.boolean()),
    requireRestorePoint: z.optional(z.boolean()),
    workDir: z.optional(z.string().min(1).max(500))
  })),
  reporting: z.optional(z.object({
    reportDir: z.optional(z.string().min(1).max(500))
  })),
  logging: z.optional(z.object({
    logDir: z.optional(z.string().min(1).max(500)),
    level: z.optional(z.string().enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'CRITICAL']))
  })),
  historyDbPath: z.optional(z.string().min(1).max(500)),
  keyFile: z.optional(z.string().min(1).max(500))
});

interface ConfigFile {
  model?: Partial<ModelConfig>;
  telemetry?: Partial<Omit<TelemetryConfig, 'scanMode'>> & { scanMode?: string };
  execution?: Partial<ExecutionConfig>;
  reporting?: Partial<ReportingConfig>;
  logging?: Partial<LoggingConfig>;
  historyDbPath?: string;
  keyFile?: string;
}

function isScanMode(value: string | undefined): value is ScanMode {
  return value === 'quick' || value === 'deep' || value === 'complete';
}

/**
 * Defaults merged section by section with the JSON config file. A missing or
 * invalid file is logged and the defaults are used.
 */
export function loadConfig(configPath: string = './remedy.config.json', logger?: LoggerLike): AgentConfig {
  const result = safeReadJSONFile(path.resolve(configPath), ConfigFileSchema);

  if (!result.success) {
    if (result.error === 'File not found') {
      logger?.info('No config file found, using defaults', { path: configPath });
    } else {
      logger?.warn('Config file rejected, using defaults', { path: configPath, reason: result.error });
    }
    return cloneDefaults();
  }

  const user: ConfigFile = result.data;
  const defaults = cloneDefaults();
  const scanMode = user.telemetry?.scanMode;

  return {
    model: { ...defaults.model, ...user.model },
    telemetry: {
      ...defaults.telemetry,
      ...user.telemetry,
      scanMode: isScanMode(scanMode) ? scanMode : defaults.telemetry.scanMode
    },
    execution: { ...defaults.execution, ...user.execution },
    reporting: { ...defaults.reporting, ...user.reporting },
    logging: { ...defaults.logging, ...user.logging },
    historyDbPath: user.historyDbPath ?? defaults.historyDbPath,
    keyFile: user.keyFile ?? defaults.keyFile
  };
}

function cloneDefaults(): AgentConfig {
  return {
    model: { ...DEFAULT_CONFIG.model },
    telemetry: { ...DEFAULT_CONFIG.telemetry },
    execution: { ...DEFAULT_CONFIG.execution },
    reporting: { ...DEFAULT_CONFIG.reporting },
    logging: { ...DEFAULT_CONFIG.logging },
    historyDbPath: DEFAULT_CONFIG.historyDbPath,
    keyFile: DEFAULT_CONFIG.keyFile
  };
}

export function resolveCategories(telemetry: TelemetryConfig): string[] {
  if (telemetry.categories && telemetry.categories.length > 0) {
    return [...new Set(telemetry.categories)];
  }
  return [...SCAN_MODE_CATEGORIES[telemetry.scanMode]];
}
