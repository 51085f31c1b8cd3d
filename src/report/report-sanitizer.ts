/**
 * Report Sanitizer
 *
 * Two separate entry points for two trust levels:
 * - model prose keeps its markup but loses anything that can run
 * - user text, process output and telemetry are escaped in full
 */

import {
  ExecutionReportFragment,
  ExecutionResult,
  FragmentSource,
  SanitizedReportFragment,
  TelemetrySnapshot
} from '../types';

const DANGEROUS_ELEMENTS = ['script', 'style', 'iframe', 'object', 'embed', 'frame', 'frameset', 'applet', 'noscript', 'template'];
const ELEMENT_NAMES = DANGEROUS_ELEMENTS.join('|');

// Element with its content, then any stray opening or closing tag left over
const ELEMENT_WITH_CONTENT = new RegExp(`<(${ELEMENT_NAMES})\\b[^>]*>[\\s\\S]*?<\\/\\1\\s*>`, 'gi');
const STRAY_TAG = new RegExp(`<\\/?(?:${ELEMENT_NAMES})\\b[^>]*>?`, 'gi');

// Attribute rules apply inside tags only. Quoted values may contain '>', and an
// unterminated tag or quoted value runs to the end.
const TAG = /<[a-zA-Z](?:"[^"]*(?:"|$)|'[^']*(?:'|$)|[^'">])*>?/g;
const EVENT_HANDLER_ATTRIBUTE = /([\s/"'])on[a-z]+\s*=\s*(?:"[^"]*"|'[^']*'|[^\s>]*)/gi;
const URL_ATTRIBUTE = /([\s/"'])(href|src|action|formaction|xlink:href|background|poster)\s*=\s*("[^"]*"|'[^']*'|[^\s>]*)/gi;
const UNSAFE_URL_SCHEME = /^(?:javascript|vbscript|data):/i;

function replaceUntilStable(text: string, pattern: RegExp, replacement: string): string {
  let previous: string;
  let current = text;
  do {
    previous = current;
    current = current.replace(pattern, replacement);
  } while (current !== previous);
  return current;
}

// Named references that can spell out or pad a URL scheme
const NAMED_REFERENCES: Readonly<Record<string, string>> = {
  colon: ':',
  tab: '\t',
  newline: '\n',
  sol: '/',
  period: '.',
  lpar: '(',
  rpar: ')',
  amp: '&',
  quot: '"',
  apos: "'"
};

const CHARACTER_REFERENCE = /&#x([0-9a-f]+);?|&#([0-9]+);?|&([a-z]+);/gi;

/** Decodes character references the way a browser does before reading an attribute */
export function decodeCharacterReferences(value: string): string {
  return value.replace(
    CHARACTER_REFERENCE,
    (reference: string, hex: string | undefined, decimal: string | undefined, name: string | undefined) => {
      if (name !== undefined) {
        return NAMED_REFERENCES[name.toLowerCase()] ?? reference;
      }
      const codePoint = hex !== undefined ? parseInt(hex, 16) : parseInt(decimal ?? '', 10);
      if (!Number.isFinite(codePoint) || codePoint === 0 || codePoint > 0x10ffff) {
        return '\ufffd';
      }
      return String.fromCodePoint(codePoint);
    }
  );
}

function isUnsafeUrl(rawValue: string): boolean {
  const unquoted = rawValue.replace(/^["']|["']$/g, '');
  // Schemes are read after references are decoded and whitespace and control characters dropped
  const collapsed = decodeCharacterReferences(unquoted).replace(/[\u0000- ]/g, '');
  return UNSAFE_URL_SCHEME.test(collapsed);
}

function fragment(source: FragmentSource, html: string): SanitizedReportFragment {
  return Object.freeze({ source, html });
}

/**
 * Removes executable content from model-authored HTML: dangerous elements,
 * event-handler attributes and script URLs. Other markup is kept, and line
 * breaks become <br>.
 */
export function sanitizeModelText(text: string): SanitizedReportFragment {
  let html = typeof text === 'string' ? text : '';

  html = replaceUntilStable(html, ELEMENT_WITH_CONTENT, '');
  html = replaceUntilStable(html, STRAY_TAG, '');
  html = html.replace(TAG, tag =>
    replaceUntilStable(tag, EVENT_HANDLER_ATTRIBUTE, '$1').replace(
      URL_ATTRIBUTE,
      (match: string, separator: string, name: string, value: string) => (isUnsafeUrl(value) ? `${separator}${name}="#"` : match)
    )
  );

  html = html.replace(/\r\n?/g, '\n').replace(/\n/g, '<br>');

  return fragment('model-text', html);
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Escapes free text completely. Nothing in the input survives as markup. */
export function escapeUserText(text: string): SanitizedReportFragment {
  return fragment('user-text', escapeHtml(typeof text === 'string' ? text : ''));
}

export function escapeProcessOutput(text: string): SanitizedReportFragment {
  return fragment('process-output', escapeHtml(text));
}

/** One escaped JSON panel per telemetry category, in snapshot order */
export function sanitizeTelemetry(snapshot: TelemetrySnapshot): Array<{ category: SanitizedReportFragment; body: SanitizedReportFragment }> {
  return Object.keys(snapshot).map(category => ({
    category: fragment('telemetry', escapeHtml(category.toUpperCase())),
    body: fragment('telemetry', escapeHtml(JSON.stringify(snapshot[category], null, 2)))
  }));
}

/**
 * Converts an execution result into report fragments. A run counts as
 * succeeded only with exit code 0, no timeout and nothing on stderr.
 */
export function summarizeExecution(result: ExecutionResult): ExecutionReportFragment {
  const succeeded = result.exitCode === 0 && !result.timedOut && result.stderr.trim().length === 0;

  let restorePoint: string;
  if (result.restorePointId) {
    restorePoint = `Restore point created: ${result.restorePointId}`;
  } else if (result.restorePointError) {
    restorePoint = `Restore point not created: ${result.restorePointError}`;
  } else {
    restorePoint = 'No restore point requested';
  }

  return Object.freeze({
    exitCode: result.exitCode,
    succeeded,
    timedOut: result.timedOut,
    stdout: escapeProcessOutput(result.stdout),
    stderr: escapeProcessOutput(result.stderr),
    restorePoint: escapeProcessOutput(restorePoint),
    startedAt: escapeProcessOutput(result.startedAt),
    finishedAt: escapeProcessOutput(result.finishedAt)
  });
}

export class ReportSanitizer {
  sanitizeModelText(text: string): SanitizedReportFragment {
    return sanitizeModelText(text);
  }

  escapeUserText(text: string): SanitizedReportFragment {
    return escapeUserText(text);
  }

  summarizeExecution(result: ExecutionResult): ExecutionReportFragment {
    return summarizeExecution(result);
  }
}
