import catalog from './known-solutions.json';
import { LoggerLike } from '../common/logger';
import { z } from '../security';
import { splitCommandSegments } from '../security/script-validator';

export interface KnownSolution {
  id: string;
  /** Lower-case phrases looked for in the problem text */
  symptoms: string[];
  description: string;
  script: string[];
  riskLevel: string;
  successRate: number;
  reversible: boolean;
  tags: string[];
}

export type KnowledgeVerdict = 'no-match' | 'matches' | 'partial' | 'different';

/** Advisory only; never changes whether a script may run */
export interface KnowledgeCheck {
  verdict: KnowledgeVerdict;
  reason: string;
  similarity: number;
  solution?: KnownSolution;
}

// A solution applies once this many of its symptom phrases appear
export const MIN_SYMPTOM_MATCHES = 2;

const KnownSolutionSchema = z.object({
  id: z.string().min(1).max(100).regex(/^[a-z0-9_]+$/),
  symptoms: z.array(z.string().min(1).max(100)).max(32),
  description: z.string().max(500),
  script: z.array(z.string().max(1000)).max(200),
  riskLevel: z.string().enum(['VERY LOW', 'LOW', 'MEDIUM', 'HIGH']),
  successRate: z.number().min(0).max(1),
  reversible: z.boolean(),
  tags: z.array(z.string().max(50)).max(32)
});

const CatalogSchema = z.array(KnownSolutionSchema).max(500);

/** Bundled catalog; an invalid catalog is logged and treated as empty */
export function loadKnownSolutions(logger?: LoggerLike, source: unknown = catalog): KnownSolution[] {
  const result = CatalogSchema.safeParse(source);
  if (!result.success) {
    logger?.error('Known solution catalog rejected', { reason: result.error });
    return [];
  }
  return result.data;
}

export function findMatchingSolution(
  problemText: string,
  solutions: readonly KnownSolution[]
): { solution: KnownSolution; score: number } | null {
  const text = problemText.toLowerCase();
  let best: { solution: KnownSolution; score: number } | null = null;

  for (const solution of solutions) {
    const score = solution.symptoms.filter(symptom => text.includes(symptom.toLowerCase())).length;
    if (score > (best?.score ?? 0)) {
      best = { solution, score };
    }
  }

  return best && best.score >= MIN_SYMPTOM_MATCHES ? best : null;
}

/** Lower-case command names, one per statement; comments and assignment targets are skipped */
export function extractCommands(script: string): Set<string> {
  const commands = new Set<string>();
  for (const segment of splitCommandSegments(script)) {
    const command = segment.text.replace(/^\$[\w:]+\s*=\s*/, '').match(/^[A-Za-z][\w-]*/);
    if (command) {
      commands.add(command[0].toLowerCase());
    }
  }
  return commands;
}

/** Jaccard similarity of the two scripts' command sets */
export function scriptSimilarity(a: string, b: string): number {
  const left = extractCommands(a);
  const right = extractCommands(b);
  if (left.size === 0 || right.size === 0) {
    return 0;
  }
  const shared = [...left].filter(command => right.has(command)).length;
  return shared / (left.size + right.size - shared);
}

export class KnowledgeBase {
  private solutions: readonly KnownSolution[];

  constructor(solutions: readonly KnownSolution[]) {
    this.solutions = solutions;
  }

  get size(): number {
    return this.solutions.length;
  }

  /** Compares a proposed fix with the known solution for the reported problem */
  check(script: string, problemText: string): KnowledgeCheck {
    const match = findMatchingSolution(problemText, this.solutions);
    if (!match) {
      return { verdict: 'no-match', reason: 'No known solution for this problem', similarity: 0 };
    }

    const { solution } = match;
    const similarity = scriptSimilarity(script, solution.script.join('\n'));
    const percent = Math.round(similarity * 100);

    if (similarity > 0.7) {
      return { verdict: 'matches', reason: `Matches known solution '${solution.id}' (${percent}% similar)`, similarity, solution };
    }
    if (similarity > 0.4) {
      return { verdict: 'partial', reason: `Partially matches known solution '${solution.id}' (${percent}% similar)`, similarity, solution };
    }
    return { verdict: 'different', reason: `Differs from known solution '${solution.id}'; review recommended`, similarity, solution };
  }
}
