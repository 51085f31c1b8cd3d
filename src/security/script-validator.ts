/**
 * Remediation Script Validator
 * Static structural checks over a sanitized script. Nothing here executes the script.
 */

import { ELEVATION_GUARD } from '../remediation/script-sanitizer';
import { RiskLevel, SafetyReport, SafetyRule, SafetyViolation, SanitizedScript } from '../types';
import { computeScriptDigest } from './script-digest';

// ===========================================
// COMMAND CATALOG
// ===========================================

const COMMAND_ALIASES: Record<string, string> = {
  rm: 'remove-item',
  ri: 'remove-item',
  del: 'remove-item',
  erase: 'remove-item',
  rd: 'remove-item',
  rmdir: 'remove-item',
  spsv: 'stop-service',
  kill: 'stop-process',
  spps: 'stop-process',
  gsv: 'get-service',
  gci: 'get-childitem',
  ls: 'get-childitem',
  dir: 'get-childitem'
};

const CMD_STYLE_DELETES = new Set(['rd', 'rmdir', 'del', 'erase']);

// Stopping, disabling or restarting a service needs a prior existence check
const SERVICE_MUTATORS = new Set(['stop-service', 'restart-service', 'suspend-service']);

// Best-effort: a single failure must not abort the rest of the script
const BEST_EFFORT_COMMANDS = new Set([
  'stop-service',
  'start-service',
  'restart-service',
  'suspend-service',
  'set-service',
  'stop-process',
  'remove-item',
  'clear-dnsclientcache',
  'clear-recyclebin'
]);

// Critical: failure must stay observable
const CRITICAL_COMMANDS = new Set(['checkpoint-computer']);

const FORMAT_COMMANDS = new Set(['format-volume', 'clear-disk', 'initialize-disk', 'format']);

// Parameters that consume the following token as their value
const VALUE_PARAMS = new Set([
  'name', 'displayname', 'include', 'exclude', 'inputobject', 'erroraction', 'ea',
  'warningaction', 'wa', 'startuptype', 'status', 'path', 'literalpath', 'lp', 'pspath',
  'filter', 'computername', 'description', 'restorepointtype', 'id', 'processname',
  'foregroundcolor', 'backgroundcolor', 'object', 'value', 'type', 'itemtype',
  'destination', 'seconds', 'milliseconds', 'argumentlist', 'filepath', 'outvariable',
  'errorvariable', 'depth', 'property', 'first', 'last', 'driveletter', 'number',
  'filesystem', 'newfilesystemlabel', 'partitionstyle'
]);

const ERROR_SUPPRESSION = /-(?:ErrorAction|EA)(?:\s+|\s*:\s*)['"]?(?:SilentlyContinue|Ignore|0)\b/i;

/**
 * Locations whose contents are disposable. A destructive operation must target
 * a path strictly inside one of these.
 */
export const EPHEMERAL_PATH_PREFIXES: readonly string[] = [
  '$env:temp',
  '$env:tmp',
  '$env:localappdata\\temp',
  '$env:windir\\temp',
  '$env:systemroot\\temp',
  'c:\\windows\\temp',
  '$env:windir\\prefetch',
  '$env:systemroot\\prefetch',
  'c:\\windows\\prefetch',
  '$env:windir\\softwaredistribution\\download',
  '$env:systemroot\\softwaredistribution\\download',
  'c:\\windows\\softwaredistribution\\download',
  '$env:windir\\logs\\cbs',
  '$env:systemroot\\logs\\cbs',
  'c:\\windows\\logs\\cbs',
  'c:\\windows\\logs\\windowsupdate',
  '$env:programdata\\microsoft\\windows\\wer\\reportqueue',
  'c:\\programdata\\microsoft\\windows\\wer\\reportqueue'
];

interface PatternRule {
  rule: SafetyRule;
  pattern: RegExp;
  detail: string;
}

const LINE_PATTERN_RULES: readonly PatternRule[] = [
  // Never allowed, whatever the target
  { rule: 'blocked-command', pattern: /\breg(?:\.exe)?\s+delete\s+HKLM\\SYSTEM/i, detail: 'deletes system registry hive keys' },
  { rule: 'blocked-command', pattern: /\breg(?:\.exe)?\s+delete\s+HKLM\\SOFTWARE\\Microsoft\\Windows/i, detail: 'deletes Windows registry keys' },
  { rule: 'blocked-command', pattern: /Remove-Item\b.*HKLM:\\SYSTEM/i, detail: 'deletes system registry hive keys' },
  { rule: 'blocked-command', pattern: /\bStop-Computer\b/i, detail: 'shuts the machine down' },
  { rule: 'blocked-command', pattern: /\bRestart-Computer\b/i, detail: 'restarts the machine' },
  { rule: 'blocked-command', pattern: /\bvssadmin(?:\.exe)?\s+delete\s+shadows\b/i, detail: 'deletes restore points and shadow copies' },
  { rule: 'blocked-command', pattern: /\bDisable-ComputerRestore\b/i, detail: 'turns off System Restore' },
  { rule: 'blocked-command', pattern: /\bbcdedit(?:\.exe)?\s+\/(?:delete|deletevalue)\b/i, detail: 'modifies boot configuration' },

  // Download-and-execute and obfuscation
  { rule: 'download-execute', pattern: /\bInvoke-Expression\b/i, detail: 'executes dynamically built code' },
  { rule: 'download-execute', pattern: /(?:^|[\s;|({])iex(?:\s|\(|$)/i, detail: 'executes dynamically built code (IEX)' },
  { rule: 'download-execute', pattern: /\bpowershell(?:\.exe)?\b.*\s-e(?:nc|ncodedcommand)?\b/i, detail: 'runs an encoded command' },
  { rule: 'download-execute', pattern: /FromBase64String/i, detail: 'decodes embedded payloads' },
  { rule: 'download-execute', pattern: /DownloadString|DownloadFile/i, detail: 'downloads remote content' },
  { rule: 'download-execute', pattern: /\bStart-BitsTransfer\b/i, detail: 'downloads remote content' },
  { rule: 'download-execute', pattern: /System\.Net\.WebClient/i, detail: 'downloads remote content' }
];

// Advisory risk weights; they do not decide `passed`
const RISK_WEIGHTS: ReadonlyArray<{ pattern: RegExp; weight: number }> = [
  { pattern: /Remove-Item(?!Property)/gi, weight: 4 },
  { pattern: /Disable-\w+/gi, weight: 3 },
  { pattern: /Stop-Service/gi, weight: 2 },
  { pattern: /Set-ItemProperty.*HKLM/gi, weight: 5 },
  { pattern: /Set-ItemProperty.*HKCU/gi, weight: 3 },
  { pattern: /reg\s+add/gi, weight: 4 },
  { pattern: /reg\s+delete/gi, weight: 6 },
  { pattern: /Remove-ItemProperty/gi, weight: 4 },
  { pattern: /netsh.*firewall/gi, weight: 5 },
  { pattern: /Set-ExecutionPolicy/gi, weight: 6 },
  { pattern: /Invoke-Command/gi, weight: 5 },
  { pattern: /Start-Process/gi, weight: 3 },
  { pattern: /-Force\b/gi, weight: 2 },
  { pattern: /-Recurse\b/gi, weight: 3 }
];

// ===========================================
// SEGMENTATION
// ===========================================

export interface CommandSegment {
  lineNumber: number;
  line: string;
  text: string;
  /** Preceded by a pipe within the same statement */
  piped: boolean;
  /** Script-block nesting depth at the start of the segment */
  depth: number;
}

/**
 * Splits a script into command segments at statement separators, braces and
 * pipes, outside quotes. Comments, block comments and here-string bodies are
 * dropped; backtick line continuations are joined.
 */
export function splitCommandSegments(script: string): CommandSegment[] {
  const rawLines = script.replace(/\r\n?/g, '\n').split('\n');
  const segments: CommandSegment[] = [];
  let inBlockComment = false;
  let hereStringEnd: string | null = null;
  let depth = 0;

  for (let i = 0; i < rawLines.length; i++) {
    const lineNumber = i + 1;
    let line = rawLines[i];

    while (line.trimEnd().endsWith('`') && i + 1 < rawLines.length) {
      line = line.trimEnd().slice(0, -1) + ' ' + rawLines[++i].trim();
    }

    if (hereStringEnd) {
      if (line.trimStart().startsWith(hereStringEnd)) {
        hereStringEnd = null;
      }
      continue;
    }

    let current = '';
    let quote: '"' | "'" | null = null;
    let piped = false;

    const flush = (nextPiped: boolean): void => {
      if (current.trim().length > 0) {
        segments.push({ lineNumber, line: rawLines[lineNumber - 1].trim(), text: current.trim(), piped, depth });
      }
      current = '';
      piped = nextPiped;
    };

    for (let c = 0; c < line.length; c++) {
      const ch = line[c];
      const next = line[c + 1];

      if (inBlockComment) {
        if (ch === '#' && next === '>') {
          inBlockComment = false;
          c++;
        }
        continue;
      }

      if (quote) {
        current += ch;
        if (ch === '`' && quote === '"' && next !== undefined) {
          current += next;
          c++;
        } else if (ch === quote) {
          quote = null;
        }
        continue;
      }

      if (ch === '<' && next === '#') {
        inBlockComment = true;
        c++;
        continue;
      }
      if (ch === '#') {
        break;
      }
      if (ch === '@' && (next === '"' || next === "'") && line.slice(c + 2).trim() === '') {
        hereStringEnd = `${next}@`;
        current += `@${next}${next}`;
        break;
      }
      if (ch === '"' || ch === "'") {
        quote = ch;
        current += ch;
        continue;
      }
      if (ch === '|' && next === '|') {
        flush(false);
        c++;
        continue;
      }
      if (ch === '|') {
        flush(true);
        continue;
      }
      if (ch === ';' || ch === '{' || ch === '}' || (ch === '&' && next === '&')) {
        flush(false);
        if (ch === '&') c++;
        if (ch === '{') depth++;
        if (ch === '}') depth = Math.max(0, depth - 1);
        continue;
      }
      current += ch;
    }

    flush(false);
  }

  return segments;
}

// ===========================================
// ARGUMENT PARSING
// ===========================================

const TOKEN_PATTERN = /"(?:[^"`]|`.)*"|'(?:[^']|'')*'|@\((?:[^()]|\([^()]*\))*\)|\((?:[^()]|\([^()]*\))*\)|,|[^\s,'"()]+/g;

function tokenize(text: string): string[] {
  return text.match(TOKEN_PATTERN) ?? [];
}

interface ParsedArgs {
  params: Map<string, string[] | true>;
  positionals: string[][];
  flags: Set<string>;
}

function parseArgs(tokens: string[], acceptSlashFlags: boolean): ParsedArgs {
  const params = new Map<string, string[] | true>();
  const positionals: string[][] = [];
  const flags = new Set<string>();

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const paramMatch = token.match(/^-([A-Za-z][\w-]*)(?::(.+))?$/);

    if (paramMatch) {
      const name = paramMatch[1].toLowerCase();
      if (paramMatch[2] !== undefined) {
        params.set(name, [paramMatch[2]]);
      } else if (VALUE_PARAMS.has(name) && i + 1 < tokens.length) {
        const values = [tokens[++i]];
        while (tokens[i + 1] === ',' && i + 2 < tokens.length) {
          values.push(tokens[i + 2]);
          i += 2;
        }
        params.set(name, values);
      } else {
        params.set(name, true);
      }
      continue;
    }

    if (acceptSlashFlags && /^\/[A-Za-z]$/.test(token)) {
      flags.add(token.toLowerCase());
      continue;
    }

    if (token === ',') {
      const last = positionals[positionals.length - 1];
      if (last && i + 1 < tokens.length) {
        last.push(tokens[++i]);
      }
      continue;
    }

    positionals.push([token]);
  }

  return { params, positionals, flags };
}

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if ((first === '"' && last === '"') || (first === "'" && last === "'")) {
      return trimmed.slice(1, -1).trim();
    }
  }
  return trimmed;
}

/** Expands `'a','b'`, `@('a','b')` and `(...)` lists into bare names */
function expandValues(values: string[]): string[] {
  const result: string[] = [];
  for (const value of values) {
    let inner = value.trim();
    if (inner.startsWith('@(') && inner.endsWith(')')) {
      inner = inner.slice(2, -1);
    } else if (inner.startsWith('(') && inner.endsWith(')')) {
      inner = inner.slice(1, -1);
    }
    for (const part of inner.split(',')) {
      const name = unquote(part);
      if (name.length > 0) {
        result.push(name);
      }
    }
  }
  return result;
}

function paramValues(args: ParsedArgs, ...names: string[]): string[] {
  for (const name of names) {
    const value = args.params.get(name);
    if (Array.isArray(value)) {
      return expandValues(value);
    }
  }
  return [];
}

function firstPositional(args: ParsedArgs): string[] {
  return args.positionals.length > 0 ? expandValues(args.positionals[0]) : [];
}

interface CommandInvocation {
  command: string;
  /** Run through cmd.exe, where PowerShell qualifiers do not apply */
  viaCmd: boolean;
  rawCommand: string;
  argsText: string;
  args: ParsedArgs;
}

const ASSIGNMENT_PREFIX = /^\$[\w:]+\s*[+\-]?=\s*/;

function parseInvocation(segmentText: string, viaCmd: boolean = false): CommandInvocation | null {
  let text = segmentText.trim();
  text = text.replace(ASSIGNMENT_PREFIX, '');
  text = text.replace(/^[(&.\s]+/, '').replace(/\)+$/, '').trim();

  const match = text.match(/^([A-Za-z][\w.-]*)(.*)$/s);
  if (!match) {
    return null;
  }

  const rawCommand = match[1];
  let command = rawCommand.toLowerCase().replace(/\.exe$/, '');
  const argsText = match[2];

  if (command === 'cmd') {
    const nested = argsText.replace(/^\s*\/c\s+/i, '');
    if (nested !== argsText) {
      return parseInvocation(nested, true);
    }
  }

  const acceptSlashFlags = CMD_STYLE_DELETES.has(command);
  command = COMMAND_ALIASES[command] ?? command;

  return {
    command,
    viaCmd,
    rawCommand,
    argsText,
    args: parseArgs(tokenize(argsText), acceptSlashFlags)
  };
}

// ===========================================
// SERVICE NAME EXTRACTION
// ===========================================

function serviceNamesFromArgs(args: ParsedArgs): string[] {
  const named = paramValues(args, 'name');
  return named.length > 0 ? named : firstPositional(args);
}

/**
 * Blanks the contents of quoted literals, keeping offsets, so command names
 * can be located in code only. An unterminated quote runs to the end.
 */
export function maskQuotedText(text: string): string {
  return text.replace(/"(?:[^"`]|`[\s\S])*(?:"|$)|'(?:[^']|'')*(?:'|$)/g, literal => {
    const closed = literal.length > 1 && literal.endsWith(literal[0]);
    return closed
      ? literal[0] + ' '.repeat(literal.length - 2) + literal[0]
      : literal[0] + ' '.repeat(literal.length - 1);
  });
}

/** Service names checked for existence by code in a segment; quoted text never counts */
function findExistenceChecks(segmentText: string): string[] {
  const names: string[] = [];
  const code = maskQuotedText(segmentText);
  let match: RegExpExecArray | null;

  const getService = /\b(?:Get-Service|gsv)\b/gi;
  while ((match = getService.exec(code)) !== null) {
    const start = match.index + match[0].length;
    const length = code.slice(start).search(/[)|;{}]/);
    const argsText = segmentText.slice(start, length === -1 ? undefined : start + length);
    names.push(...serviceNamesFromArgs(parseArgs(tokenize(argsText), false)));
  }

  const scQuery = /\bsc(?:\.exe)?\s+(?:query|qc)\s+/gi;
  while ((match = scQuery.exec(code)) !== null) {
    const name = segmentText.slice(match.index + match[0].length).match(/^["']?([^\s"']+)/);
    if (name) {
      names.push(name[1]);
    }
  }

  // The filter itself is a string, so only the cmdlet has to be code
  if (/\b(?:Get-CimInstance|Get-WmiObject|gcim|gwmi)\b/i.test(code)) {
    const wmiFilter = /Win32_Service\b.*?Name\s*=\s*\\?['"]([^'"\\]+)/gi;
    while ((match = wmiFilter.exec(segmentText)) !== null) {
      names.push(match[1]);
    }
  }

  return names;
}

interface ServiceMutation {
  action: string;
  names: string[];
}

function findServiceMutation(invocation: CommandInvocation): ServiceMutation | null {
  const { command, args } = invocation;

  if (SERVICE_MUTATORS.has(command)) {
    return { action: command, names: serviceNamesFromArgs(args) };
  }

  if (command === 'set-service') {
    const startupType = paramValues(args, 'startuptype')[0]?.toLowerCase();
    const status = paramValues(args, 'status')[0]?.toLowerCase();
    if (startupType === 'disabled' || status === 'stopped' || status === 'paused') {
      return { action: 'set-service', names: serviceNamesFromArgs(args) };
    }
    return null;
  }

  if (command === 'sc' || command === 'net') {
    const words = args.positionals.map(group => unquote(group[0]));
    const sub = words[0]?.toLowerCase();
    if (command === 'sc' && (sub === 'stop' || sub === 'pause' || (sub === 'config' && /start=\s*disabled/i.test(invocation.argsText)))) {
      return { action: `sc ${sub}`, names: words[1] ? [words[1]] : [] };
    }
    if (command === 'net' && (sub === 'stop' || sub === 'pause')) {
      return { action: `net ${sub}`, names: words[1] ? [words[1]] : [] };
    }
  }

  return null;
}

// ===========================================
// PATH CHECKS
// ===========================================

export function normalizeTargetPath(raw: string): string {
  return unquote(raw)
    .replace(/\$\{env:([A-Za-z_][\w]*)\}/gi, '$env:$1')
    .replace(/\$\(\$env:([A-Za-z_][\w]*)\)/gi, '$env:$1')
    .replace(/\//g, '\\')
    .toLowerCase();
}

/**
 * True when the path lies strictly inside an allowed location. With allowRoot
 * the location itself also matches, for paths whose children are the target.
 */
export function isEphemeralPath(raw: string, allowRoot: boolean = false): boolean {
  const target = normalizeTargetPath(raw).replace(/\\+$/, '');
  if (target.includes('..')) {
    return false;
  }
  return EPHEMERAL_PATH_PREFIXES.some(prefix =>
    (allowRoot && target === prefix) || target.startsWith(prefix + '\\')
  );
}

function deleteTargets(args: ParsedArgs): string[] {
  const named = paramValues(args, 'path', 'literalpath', 'lp', 'pspath');
  return named.length > 0 ? named : firstPositional(args);
}

function isRecursiveDelete(args: ParsedArgs): boolean {
  for (const name of args.params.keys()) {
    if (name === 'recurse' || name === 'r' || name === 'rec') {
      return true;
    }
  }
  return args.flags.has('/s');
}

/** What the previous stage of a pipeline, or a listing variable, feeds forward */
interface PipelineSource {
  services: string[];
  paths: string[];
  /** The listing descends into subdirectories */
  recursive: boolean;
}

const emptySource = (): PipelineSource => ({ services: [], paths: [], recursive: false });

const CURRENT_ITEM = /^\$(?:_|PSItem)(?:\.(?:FullName|PSPath|Path))?$/i;

function enclosingSource(pipelines: Map<number, PipelineSource>, depth: number): PipelineSource | undefined {
  for (let level = depth - 1; level >= 0; level--) {
    const source = pipelines.get(level);
    if (source && (source.paths.length > 0 || source.recursive)) {
      return source;
    }
  }
  return undefined;
}

const ASSIGNMENT_TARGET = /^(\$[\w:]+)\s*=\s*(.*)$/s;

// ===========================================
// VALIDATION
// ===========================================

function firstExecutableLine(script: string): { lineNumber: number; line: string } {
  const lines = script.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (trimmed.length > 0 && !trimmed.startsWith('#')) {
      return { lineNumber: i + 1, line: trimmed };
    }
  }
  return { lineNumber: 1, line: '' };
}

export function scoreScriptRisk(scriptText: string): number {
  let score = 0;
  for (const { pattern, weight } of RISK_WEIGHTS) {
    const matches = scriptText.match(pattern);
    if (matches) {
      score += weight * matches.length;
    }
  }
  if (scriptText.length > 10000) score += 5;
  if (scriptText.split('\n').length > 200) score += 3;
  return score;
}

export function getRiskLevel(riskScore: number): RiskLevel {
  if (riskScore === 0) return 'NONE';
  if (riskScore < 5) return 'VERY LOW';
  if (riskScore < 10) return 'LOW';
  if (riskScore < 20) return 'MEDIUM';
  if (riskScore < 40) return 'HIGH';
  return 'CRITICAL';
}

/**
 * Validates a sanitized script. passed is true only when no rule produced a
 * violation; violations are ordered by line.
 */
export function validateScript(script: SanitizedScript): SafetyReport {
  const violations: SafetyViolation[] = [];
  const text = script.text;

  const add = (rule: SafetyRule, lineNumber: number, offendingLine: string, detail: string): void => {
    violations.push({ rule, lineNumber, offendingLine, detail });
  };

  // Elevation guard must open the script
  if (!text.startsWith(ELEVATION_GUARD)) {
    const first = firstExecutableLine(text);
    add('elevation-guard', first.lineNumber, first.line, 'the elevation guard must be the first executable statement');
  }

  // Line-level blocklists
  const lines = text.split('\n');
  const segments = splitCommandSegments(text);
  const codeLines = new Map<number, string>();
  for (const segment of segments) {
    codeLines.set(segment.lineNumber, (codeLines.get(segment.lineNumber) ?? '') + ' ' + segment.text);
  }
  for (const [lineNumber, code] of codeLines) {
    for (const { rule, pattern, detail } of LINE_PATTERN_RULES) {
      if (pattern.test(code)) {
        add(rule, lineNumber, lines[lineNumber - 1].trim(), detail);
      }
    }
  }

  // Program-order structural checks
  const checkedServices = new Set<string>();
  const variableServices = new Map<string, string[]>();
  const variableListings = new Map<string, PipelineSource>();
  // A script block's segments must not end the pipeline that encloses it
  const pipelines = new Map<number, PipelineSource>();

  for (const segment of segments) {
    if (!segment.piped) {
      for (const depth of Array.from(pipelines.keys())) {
        if (depth >= segment.depth) {
          pipelines.delete(depth);
        }
      }
    }
    const pipeline = pipelines.get(segment.depth) ?? emptySource();
    pipelines.set(segment.depth, pipeline);

    const checks = findExistenceChecks(segment.text);
    for (const name of checks) {
      checkedServices.add(name.toLowerCase());
    }

    const assignment = segment.text.match(ASSIGNMENT_TARGET);
    const assignedTo = assignment?.[1].toLowerCase();
    if (assignment && /^(?:Get-Service|gsv)\b/i.test(assignment[2]) && checks.length > 0) {
      variableServices.set(assignment[1].toLowerCase(), checks);
    }

    const invocation = parseInvocation(segment.text);
    if (!invocation) {
      const variableRef = segment.text.match(/^(\$[\w:]+)$/);
      if (variableRef) {
        const name = variableRef[1].toLowerCase();
        const listing = variableListings.get(name);
        pipeline.services = variableServices.get(name) ?? [];
        pipeline.paths = listing ? listing.paths : [];
        pipeline.recursive = listing ? listing.recursive : false;
      }
      continue;
    }

    const { command, args } = invocation;
    const line = segment.line;

    // Service mutations need an earlier existence check for the same name
    const mutation = findServiceMutation(invocation);
    if (mutation) {
      let names = mutation.names;
      if (names.length === 0) {
        const inputObject = paramValues(args, 'inputobject')[0];
        if (inputObject) {
          names = variableServices.get(inputObject.toLowerCase()) ?? [];
        } else if (segment.piped) {
          names = pipeline.services;
        }
      }

      if (names.length === 0) {
        add('service-existence-check', segment.lineNumber, line,
          `${invocation.rawCommand}: target service could not be determined`);
      }
      for (const name of names) {
        if (!checkedServices.has(name.toLowerCase())) {
          add('service-existence-check', segment.lineNumber, line,
            `${invocation.rawCommand} ${name} is not preceded by an existence check for '${name}'`);
        }
      }
    }

    // Destructive filesystem operations stay inside ephemeral locations
    if (FORMAT_COMMANDS.has(command)) {
      add('destructive-filesystem', segment.lineNumber, line,
        `${invocation.rawCommand} never targets an ephemeral location`);
    } else if (command === 'remove-item') {
      let targets = deleteTargets(args);
      let source: PipelineSource | undefined;
      if (targets.length === 0 && segment.piped) {
        source = pipeline;
      } else if (targets.length === 1 && CURRENT_ITEM.test(targets[0])) {
        // The current item of an enclosing pipeline, as in ForEach-Object { Remove-Item $_ }
        source = enclosingSource(pipelines, segment.depth);
      } else if (targets.length === 1) {
        // A listing held in a variable and passed as the path
        source = variableListings.get(targets[0].toLowerCase());
      }
      if (source) {
        targets = source.paths;
      }
      const inherited = source !== undefined;
      const wildcard = targets.some(target => /[*?]/.test(target));
      if (isRecursiveDelete(args) || wildcard || (source?.recursive ?? false)) {
        if (targets.length === 0) {
          add('destructive-filesystem', segment.lineNumber, line,
            `${invocation.rawCommand}: target path could not be determined`);
        }
        for (const target of targets) {
          if (!isEphemeralPath(target, inherited)) {
            add('destructive-filesystem', segment.lineNumber, line,
              `${invocation.rawCommand} targets '${target}', outside the allowed temporary and cache locations`);
          }
        }
      }
    } else if (command === 'get-childitem') {
      pipeline.paths = deleteTargets(args);
      pipeline.recursive = isRecursiveDelete(args);
      if (assignedTo) {
        variableListings.set(assignedTo, { services: [], paths: pipeline.paths, recursive: pipeline.recursive });
      }
    }

    // Error-suppression qualifiers
    const suppressed = ERROR_SUPPRESSION.test(invocation.argsText);
    if (BEST_EFFORT_COMMANDS.has(command) && !suppressed && !invocation.viaCmd) {
      add('missing-error-suppression', segment.lineNumber, line,
        `${invocation.rawCommand} is best-effort and needs -ErrorAction SilentlyContinue`);
    }
    if (CRITICAL_COMMANDS.has(command) && suppressed) {
      add('critical-error-suppressed', segment.lineNumber, line,
        `${invocation.rawCommand} is critical; its failure must not be suppressed`);
    }

    if (command === 'get-service' && checks.length > 0) {
      pipeline.services = checks;
    }
  }

  const ordered = violations
    .map((violation, index) => ({ violation, index }))
    .sort((a, b) => a.violation.lineNumber - b.violation.lineNumber || a.index - b.index)
    .map(entry => entry.violation);

  const riskScore = scoreScriptRisk(text);

  return {
    passed: ordered.length === 0,
    violations: ordered,
    scriptDigest: computeScriptDigest(text),
    riskScore,
    riskLevel: getRiskLevel(riskScore)
  };
}

export class SafetyValidator {
  validate(script: SanitizedScript): SafetyReport {
    return validateScript(script);
  }
}
