import * as os from 'os';
import { ProcessOutcome } from '../src/execution/script-runner';
import {
  TelemetryCollector,
  createDefaultProbes,
  probeSystem,
  toTelemetryValue,
  windowsProbe
} from '../src/telemetry/telemetry-collector';
import { TelemetryFields } from '../src/types';
import { createMockLogger } from './helpers/mock-logger';

describe('TelemetryCollector', () => {
  it('runs configured probes and records failures per category', async () => {
    const logger = createMockLogger();
    const collector = new TelemetryCollector(
      {
        system: async () => ({ OS: 'Windows 11' }),
        network: async () => {
          throw new Error('adapter query failed');
        }
      },
      { categories: ['system', 'network', 'gpu'], probeTimeoutMs: 1000 },
      logger
    );

    const snapshot = await collector.collect();

    expect(snapshot).toEqual({ system: { OS: 'Windows 11' }, network: { error: 'adapter query failed' } });
    expect(Object.keys(snapshot)).toEqual(['system', 'network']);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.system)).toBe(true);
    expect(logger.debug).toHaveBeenCalledWith('No telemetry probe for category on this platform', { category: 'gpu' });
    expect(logger.warn).toHaveBeenCalledWith('Telemetry probe failed, continuing with partial data', {
      category: 'network',
      error: 'adapter query failed'
    });
  });

  it('bounds each probe with a timeout', async () => {
    const collector = new TelemetryCollector(
      { slow: () => new Promise<TelemetryFields>(() => undefined) },
      { categories: ['slow'], probeTimeoutMs: 20 },
      createMockLogger()
    );

    await expect(collector.collect()).resolves.toEqual({ slow: { error: 'slow probe timed out after 20ms' } });
  });
});

describe('windowsProbe', () => {
  it('runs one query per field and keeps partial results', async () => {
    const runner = {
      runFile: jest.fn(async (_filePath: string, _timeoutMs: number): Promise<ProcessOutcome> => ({
        exitCode: 0, stdout: '', stderr: '', timedOut: false
      })),
      runCommand: jest.fn(async (script: string, _timeoutMs: number): Promise<ProcessOutcome> => {
        if (script.startsWith('Get-A')) return { exitCode: 0, stdout: '{"Name":"eth0","Speed":1}\r\n', stderr: '', timedOut: false };
        if (script.startsWith('Get-B')) return { exitCode: 1, stdout: '', stderr: 'Access denied', timedOut: false };
        return { exitCode: 0, stdout: '', stderr: '', timedOut: false };
      })
    };

    const probe = windowsProbe(runner, { A: 'Get-A', B: 'Get-B', C: 'Get-C' }, 1000);

    await expect(probe()).resolves.toEqual({ A: { Name: 'eth0', Speed: 1 }, B: 'N/A (Access denied)', C: null });
    expect(runner.runCommand).toHaveBeenCalledWith('Get-A | ConvertTo-Json -Depth 3 -Compress', 1000);
  });
});

describe('built-in probes', () => {
  const runner = {
    runFile: jest.fn(),
    runCommand: jest.fn()
  };

  it('only adds PowerShell probes on Windows', () => {
    expect(Object.keys(createDefaultProbes(runner, 1000, 'linux'))).toEqual(['system', 'performance']);
    const windows = Object.keys(createDefaultProbes(runner, 1000, 'win32'));
    expect(windows).toHaveLength(10);
    expect(windows).toEqual(expect.arrayContaining(['network', 'security', 'events', 'disk', 'gpu', 'startup']));
    expect(runner.runCommand).not.toHaveBeenCalled();
  });

  it('reports basic system facts', async () => {
    const system = await probeSystem();
    expect(system.Architecture).toBe(os.arch());
    expect(system['CPU Context']).toBe(`${os.cpus().length} Threads`);
  });

  it('converts arbitrary JSON into telemetry values', () => {
    expect(toTelemetryValue({ a: undefined, b: [1, 'x', true, null], c: 10n })).toEqual({
      a: null,
      b: [1, 'x', true, null],
      c: '10'
    });
  });
});
