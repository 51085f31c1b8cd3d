/**
 * Script sanitizer.
 *
 * Pure text transform applied to every generated script before validation:
 *  0. normalise line endings, drop markdown fences, trim
 *  1. rewrite ambiguous variable references next to a drive/path separator
 *  2. prepend the canonical elevation guard
 *
 * Deterministic and idempotent: sanitize(sanitize(s)).text === sanitize(s).text.
 */

import { SanitizedScript, ScriptRewrite } from '../types';

export const ELEVATION_GUARD_BEGIN = '# --- elevation guard ---';
export const ELEVATION_GUARD_END = '# --- end elevation guard ---';
export const ELEVATION_GUARD_CHECK =
  'if (-not ([Security.Principal.WindowsPrincipal][Security.Principal.WindowsIdentity]::GetCurrent()).IsInRole([Security.Principal.WindowsBuiltInRole]::Administrator)) {';

export const ELEVATION_GUARD = [
  ELEVATION_GUARD_BEGIN,
  ELEVATION_GUARD_CHECK,
  '    Write-Host "ERROR: This script requires Administrator privileges" -ForegroundColor Red',
  '    exit 1',
  '}',
  ELEVATION_GUARD_END
].join('\n');

export interface RewriteRule {
  id: string;
  description: string;
  /** Global pattern; group 1 is the variable name, group 2 the separator */
  pattern: RegExp;
  /** Lower-case names that are left untouched */
  exceptions: ReadonlySet<string>;
  replacement: (name: string, separator: string) => string;
}

/** Scope modifiers and provider drives that legitimately follow `$` with a colon */
export const SCOPE_PREFIXES: ReadonlySet<string> = new Set([
  'env', 'global', 'local', 'script', 'private', 'using', 'variable', 'function', 'alias', 'workflow',
  'hklm', 'hkcu', 'hkcr', 'hku', 'hkcc', 'cert', 'wsman', 'c', 'd'
]);

/** Automatic variables that hold a path and may be followed by `\` as-is */
export const KNOWN_PATH_VARIABLES: ReadonlySet<string> = new Set([
  'home', 'pshome', 'psscriptroot', 'pscommandpath', 'pwd', 'profile'
]);

const explicitForm = (name: string, separator: string): string => '$($' + name + ')' + separator;

export const REWRITE_RULES: readonly RewriteRule[] = [
  {
    id: 'variable-before-colon',
    description: '"$name:" parses as a scope-qualified variable; use "$($name):"',
    pattern: /(?<!`)\$([A-Za-z][A-Za-z0-9_]*)(:)(?!:)/g,
    exceptions: SCOPE_PREFIXES,
    replacement: explicitForm
  },
  {
    id: 'pipeline-variable-before-colon',
    description: '"$_:" parses as a drive-qualified name; use "$($_):"',
    pattern: /(?<!`)\$(_)(:)(?!:)/g,
    exceptions: new Set<string>(),
    replacement: explicitForm
  },
  {
    id: 'variable-before-path-separator',
    description: 'bare "$name\\" next to a path is made explicit as "$($name)\\"',
    pattern: /(?<!`)\$([A-Za-z][A-Za-z0-9_]*)(\\)/g,
    exceptions: KNOWN_PATH_VARIABLES,
    replacement: explicitForm
  }
];

const FENCE_LINE = /^\s*```[\w+-]*\s*$/;

export function normalizeScript(rawScript: string): string {
  return rawScript
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .filter(line => !FENCE_LINE.test(line))
    .join('\n')
    .trim();
}

export function applyRewriteRules(
  body: string,
  rules: readonly RewriteRule[] = REWRITE_RULES,
  lineOffset: number = 0
): { text: string; rewrites: ScriptRewrite[] } {
  const rewrites: ScriptRewrite[] = [];

  const lines = body.split('\n').map((line, index) => {
    let current = line;
    for (const rule of rules) {
      const next = current.replace(rule.pattern, (match: string, name: string, separator: string) => {
        if (rule.exceptions.has(name.toLowerCase())) {
          return match;
        }
        return rule.replacement(name, separator);
      });
      if (next !== current) {
        rewrites.push({ rule: rule.id, line: index + 1 + lineOffset, before: current, after: next });
        current = next;
      }
    }
    return current;
  });

  return { text: lines.join('\n'), rewrites };
}

export function hasElevationGuard(script: string): boolean {
  return script.startsWith(ELEVATION_GUARD);
}

export function sanitizeScript(rawScript: string): SanitizedScript {
  const normalized = normalizeScript(rawScript);
  const alreadyGuarded = hasElevationGuard(normalized);
  const body = alreadyGuarded
    ? normalized.slice(ELEVATION_GUARD.length).replace(/^\s+/, '')
    : normalized;

  // Rewrite line numbers refer to the final script, after the guard and a blank line
  const guardLines = ELEVATION_GUARD.split('\n').length + 1;
  const { text: rewritten, rewrites } = applyRewriteRules(body, REWRITE_RULES, guardLines);

  const text = rewritten.length > 0 ? `${ELEVATION_GUARD}\n\n${rewritten}` : ELEVATION_GUARD;

  return {
    text,
    guardInjected: !alreadyGuarded,
    rewrites
  };
}

export class ScriptSanitizer {
  sanitize(rawScript: string): SanitizedScript {
    return sanitizeScript(rawScript);
  }
}
