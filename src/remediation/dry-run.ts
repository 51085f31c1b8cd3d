/**
 * Static preview of what a remediation script would change.
 * Nothing is executed; results are shown at the confirmation boundary.
 */

import { getRiskLevel } from '../security';
import { DryRunChange, DryRunChangeKind, DryRunSummary } from '../types';

interface ChangePattern {
  kind: DryRunChangeKind;
  action: string;
  pattern: RegExp;
}

const CHANGE_PATTERNS: readonly ChangePattern[] = [
  { kind: 'service', action: 'STOP', pattern: /Stop-Service\s+(?:-Name\s+)?["']?([^"'\s;|]+)/gi },
  { kind: 'service', action: 'START', pattern: /Start-Service\s+(?:-Name\s+)?["']?([^"'\s;|]+)/gi },
  { kind: 'service', action: 'RESTART', pattern: /Restart-Service\s+(?:-Name\s+)?["']?([^"'\s;|]+)/gi },
  { kind: 'service', action: 'CONFIGURE', pattern: /Set-Service\s+(?:-Name\s+)?["']?([^"'\s;|]+).*-StartupType\s+(?!Disabled)\w+/gi },
  { kind: 'service', action: 'DISABLE', pattern: /Set-Service\s+(?:-Name\s+)?["']?([^"'\s;|]+).*-StartupType\s+Disabled/gi },

  { kind: 'file', action: 'DELETE', pattern: /Remove-Item\s+(?:-(?:Path|LiteralPath)\s+)?["']?([^"'\s;|]+)/gi },
  { kind: 'file', action: 'CREATE', pattern: /New-Item\s+(?:-Path\s+)?["']?([^"'\s;|]+)/gi },
  { kind: 'file', action: 'MODIFY', pattern: /Set-Content\s+(?:-Path\s+)?["']?([^"'\s;|]+)/gi },
  { kind: 'file', action: 'CLEAR', pattern: /Clear-Content\s+(?:-Path\s+)?["']?([^"'\s;|]+)/gi },

  { kind: 'registry', action: 'MODIFY', pattern: /Set-ItemProperty\s+(?:-Path\s+)?["']?((?:HK\w+|Registry::)[^"'\s;|]*)/gi },
  { kind: 'registry', action: 'CREATE', pattern: /New-ItemProperty\s+(?:-Path\s+)?["']?((?:HK\w+|Registry::)[^"'\s;|]*)/gi },
  { kind: 'registry', action: 'DELETE', pattern: /Remove-ItemProperty\s+(?:-Path\s+)?["']?((?:HK\w+|Registry::)[^"'\s;|]*)/gi },
  { kind: 'registry', action: 'ADD', pattern: /\breg(?:\.exe)?\s+add\s+["']?([^"'\s;|]+)/gi },
  { kind: 'registry', action: 'DELETE', pattern: /\breg(?:\.exe)?\s+delete\s+["']?([^"'\s;|]+)/gi },

  { kind: 'process', action: 'STOP', pattern: /Stop-Process\s+.*?-Name\s+["']?([^"'\s;|]+)/gi },
  { kind: 'process', action: 'STOP', pattern: /Stop-Process\s+.*?-Id\s+(\d+)/gi },
  { kind: 'process', action: 'START', pattern: /Start-Process\s+(?:-FilePath\s+)?["']?([^"'\s;|]+)/gi },

  { kind: 'network', action: 'FIREWALL', pattern: /(netsh\s+(?:adv)?firewall|Set-NetFirewallRule|New-NetFirewallRule)/gi },
  { kind: 'network', action: 'FLUSH-DNS', pattern: /(Clear-DnsClientCache|ipconfig\s+\/flushdns)/gi }
];

const KIND_WEIGHTS: Record<DryRunChangeKind, number> = {
  service: 2,
  file: 3,
  registry: 4,
  process: 1,
  network: 3
};

function stripComments(script: string): string {
  return script
    .replace(/<#[\s\S]*?#>/g, '')
    .split('\n')
    .map(line => (line.trimStart().startsWith('#') ? '' : line))
    .join('\n');
}

function estimateRisk(changes: readonly DryRunChange[]): number {
  let score = 0;
  for (const change of changes) {
    score += KIND_WEIGHTS[change.kind];
    if (change.kind === 'file' && change.action === 'DELETE') score += 5;
    if (change.kind === 'registry' && /^HKLM|HKEY_LOCAL_MACHINE/i.test(change.target)) score += 5;
  }
  return score;
}

export function simulate(script: string): DryRunSummary {
  const code = stripComments(script);
  const found: Array<{ position: number; change: DryRunChange }> = [];

  for (const { kind, action, pattern } of CHANGE_PATTERNS) {
    for (const match of code.matchAll(pattern)) {
      found.push({ position: match.index ?? 0, change: { kind, action, target: match[1] } });
    }
  }

  // Script order
  const changes = found
    .sort((a, b) => a.position - b.position)
    .map(entry => entry.change);

  return {
    changes,
    totalChanges: changes.length,
    estimatedRisk: getRiskLevel(estimateRisk(changes))
  };
}

const KIND_ORDER: readonly DryRunChangeKind[] = ['service', 'file', 'registry', 'process', 'network'];

const KIND_LABELS: Record<DryRunChangeKind, string> = {
  service: 'Services',
  file: 'Files',
  registry: 'Registry',
  process: 'Processes',
  network: 'Network'
};

/** Plain-text summary for the confirmation prompt, at most `perKind` items per group */
export function formatDryRunSummary(summary: DryRunSummary, perKind: number = 5): string {
  const lines = [
    'DRY-RUN SIMULATION RESULTS',
    `Total Changes: ${summary.totalChanges}`,
    `Risk Level: ${summary.estimatedRisk}`
  ];

  for (const kind of KIND_ORDER) {
    const items = summary.changes.filter(change => change.kind === kind);
    if (items.length === 0) {
      continue;
    }
    lines.push('', `${KIND_LABELS[kind]} (${items.length}):`);
    for (const item of items.slice(0, perKind)) {
      lines.push(`  - ${item.action}: ${item.target}`);
    }
    if (items.length > perKind) {
      lines.push(`  ... and ${items.length - perKind} more`);
    }
  }

  if (summary.totalChanges === 0) {
    lines.push('', 'No system changes detected.');
  }

  return lines.join('\n');
}

export class DryRunSimulator {
  simulate(script: string): DryRunSummary {
    return simulate(script);
  }
}
