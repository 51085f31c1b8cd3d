/**
 * The only contract between the pipeline and the model: two delimited sections.
 * Both the prompt builder and the response parser read these definitions.
 */

export const SENTINELS = {
  analysisOpen: '[ANALYSIS_START]',
  analysisClose: '[ANALYSIS_END]',
  fixOpen: '[FIX_START]',
  fixClose: '[FIX_END]'
} as const;

export type Sentinel = typeof SENTINELS[keyof typeof SENTINELS];

export interface SectionDefinition {
  name: 'analysis' | 'fix';
  open: Sentinel;
  close: Sentinel;
  description: string;
}

export const RESPONSE_SECTIONS: readonly SectionDefinition[] = [
  {
    name: 'analysis',
    open: SENTINELS.analysisOpen,
    close: SENTINELS.analysisClose,
    description: 'Technical diagnosis as HTML fragments (h3, p, ul, li). No script or style elements.'
  },
  {
    name: 'fix',
    open: SENTINELS.fixOpen,
    close: SENTINELS.fixClose,
    description: 'A single PowerShell remediation script. Plain text, no markdown fences.'
  }
];

/** Every sentinel, longest first so a scan never matches a prefix of another */
export const ALL_SENTINELS: readonly Sentinel[] = Object.values(SENTINELS)
  .slice()
  .sort((a, b) => b.length - a.length);

// Anything that looks like a sentinel, in any case, with optional inner spacing
const SENTINEL_LOOKALIKE = /\[\s*(ANALYSIS|FIX)\s*_\s*(START|END)\s*\]/gi;

/**
 * Defuses sentinel-looking text in data echoed into the prompt (telemetry values,
 * the user's description) so it cannot open or close a section.
 */
export function neutralizeSentinels(text: string): string {
  return text.replace(SENTINEL_LOOKALIKE, (_match, section: string, edge: string) =>
    `(${section.toUpperCase()}-${edge.toUpperCase()})`
  );
}

export function containsSentinel(text: string): boolean {
  return ALL_SENTINELS.some(sentinel => text.includes(sentinel));
}

/**
 * Renders the output structure instructions: each section's sentinels wrapped
 * around its example body.
 */
export function describeOutputStructure(examples: Record<SectionDefinition['name'], string>): string {
  return RESPONSE_SECTIONS.map(section => [
    `${section.open}`,
    examples[section.name].trim(),
    `${section.close}`
  ].join('\n')).join('\n\n');
}
