import {
  ELEVATION_GUARD,
  ScriptSanitizer,
  hasElevationGuard,
  normalizeScript,
  sanitizeScript
} from '../src/remediation/script-sanitizer';

const bodyOf = (text: string): string => text.slice(ELEVATION_GUARD.length + 2);

describe('ScriptSanitizer - elevation guard', () => {
  it('prepends the guard followed by a blank line', () => {
    const result = sanitizeScript('Write-Host "Done"');
    expect(result.text).toBe(`${ELEVATION_GUARD}\n\nWrite-Host "Done"`);
    expect(result.guardInjected).toBe(true);
    expect(hasElevationGuard(result.text)).toBe(true);
  });

  it('prepends the guard even when the script has its own admin check', () => {
    const own = 'if (-not (Test-Admin)) { exit 1 }\nWrite-Host "ok"';
    const result = sanitizeScript(own);
    expect(result.text.startsWith(ELEVATION_GUARD)).toBe(true);
    expect(bodyOf(result.text)).toBe(own);
  });

  it('produces the guard alone for an empty script', () => {
    expect(sanitizeScript('').text).toBe(ELEVATION_GUARD);
  });

  it('aborts with exit 1 when not elevated', () => {
    expect(ELEVATION_GUARD).toContain('IsInRole([Security.Principal.WindowsBuiltInRole]::Administrator)');
    expect(ELEVATION_GUARD).toContain('    exit 1');
  });
});

describe('ScriptSanitizer - normalisation', () => {
  it('strips markdown fences and surrounding whitespace', () => {
    expect(normalizeScript('\n```powershell\nWrite-Host "a"\n```\n')).toBe('Write-Host "a"');
  });

  it('normalises CRLF line endings', () => {
    expect(sanitizeScript('Write-Host "a"\r\nWrite-Host "b"').text).toBe(`${ELEVATION_GUARD}\n\nWrite-Host "a"\nWrite-Host "b"`);
  });
});

describe('ScriptSanitizer - variable rewrites', () => {
  it('wraps a variable followed by a colon', () => {
    const result = sanitizeScript('Write-Host "Path $path: ok"');
    expect(bodyOf(result.text)).toBe('Write-Host "Path $($path): ok"');
    expect(result.rewrites).toEqual([
      {
        rule: 'variable-before-colon',
        line: 8,
        before: 'Write-Host "Path $path: ok"',
        after: 'Write-Host "Path $($path): ok"'
      }
    ]);
  });

  it('wraps the pipeline variable followed by a colon', () => {
    expect(bodyOf(sanitizeScript('Write-Host "$_: failed"').text)).toBe('Write-Host "$($_): failed"');
  });

  it('keeps scope-qualified and environment references', () => {
    const script = 'Remove-Item -Path "$env:TEMP\\*" -Recurse\n$script:count = 1\nWrite-Host $using:name';
    const result = sanitizeScript(script);
    expect(bodyOf(result.text)).toBe(script);
    expect(result.rewrites).toEqual([]);
  });

  it('makes a variable before a path separator explicit unless it is a known path variable', () => {
    const result = sanitizeScript('Get-ChildItem "$logDir\\old"\nGet-ChildItem "$HOME\\Downloads"');
    expect(bodyOf(result.text)).toBe('Get-ChildItem "$($logDir)\\old"\nGet-ChildItem "$HOME\\Downloads"');
    expect(result.rewrites.map(rewrite => rewrite.line)).toEqual([8]);
  });

  it('leaves escaped dollars and static member access alone', () => {
    const script = 'Write-Host "`$literal: text"\n$value = $type::Parse("1")';
    expect(bodyOf(sanitizeScript(script).text)).toBe(script);
  });
});

describe('ScriptSanitizer - idempotence', () => {
  const samples = [
    '',
    'Write-Host "Path $path: ok"',
    '```powershell\r\nStop-Service -Name $svc -ErrorAction SilentlyContinue\r\n```',
    'Get-ChildItem "$dir\\x" | ForEach-Object { Write-Host "$_: $($_.Name)" }'
  ];

  it.each(samples)('sanitizing twice equals sanitizing once (%#)', raw => {
    const once = sanitizeScript(raw);
    const twice = new ScriptSanitizer().sanitize(once.text);
    expect(twice.text).toBe(once.text);
    expect(twice.guardInjected).toBe(false);
    expect(twice.rewrites).toEqual([]);
  });
});
