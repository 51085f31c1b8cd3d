import { ModelResponse, ParsedDiagnosis } from '../types';
import { ALL_SENTINELS, SENTINELS, Sentinel } from './response-contract';

type ParserState = 'SEEKING_ANALYSIS' | 'IN_ANALYSIS' | 'SEEKING_FIX' | 'IN_FIX' | 'DONE';

interface SentinelHit {
  sentinel: Sentinel;
  start: number;
  end: number;
}

function findSentinels(text: string): SentinelHit[] {
  const hits: SentinelHit[] = [];
  let index = 0;

  while (index < text.length) {
    const next = text.indexOf('[', index);
    if (next === -1) {
      break;
    }
    const sentinel = ALL_SENTINELS.find(candidate => text.startsWith(candidate, next));
    if (sentinel) {
      hits.push({ sentinel, start: next, end: next + sentinel.length });
      index = next + sentinel.length;
    } else {
      index = next + 1;
    }
  }

  return hits;
}

/**
 * Extracts the analysis and fix sections from free-form model output.
 *
 * The first opening sentinel wins and its region ends at the first boundary
 * after it; later duplicates are ordinary text. Text outside a region is
 * discarded. Never throws: malformed output is reported through wellFormed.
 */
export function parseResponse(responseText: ModelResponse): ParsedDiagnosis {
  const text = typeof responseText === 'string' ? responseText : '';
  const hits = findSentinels(text);

  let state: ParserState = 'SEEKING_ANALYSIS';
  let analysisText = '';
  let rawScript = '';
  let analysisStart = -1;
  let fixStart = -1;
  let analysisClosed = false;
  let fixClosed = false;
  let analysisSeen = false;

  for (const hit of hits) {
    switch (state) {
      case 'SEEKING_ANALYSIS':
        if (hit.sentinel === SENTINELS.analysisOpen) {
          analysisSeen = true;
          analysisStart = hit.end;
          state = 'IN_ANALYSIS';
        } else if (hit.sentinel === SENTINELS.fixOpen) {
          fixStart = hit.end;
          state = 'IN_FIX';
        }
        break;

      case 'IN_ANALYSIS':
        if (hit.sentinel === SENTINELS.analysisClose) {
          analysisText = text.slice(analysisStart, hit.start);
          analysisClosed = true;
          state = 'SEEKING_FIX';
        } else if (hit.sentinel === SENTINELS.fixOpen) {
          // Missing close: the analysis ends where the fix begins
          analysisText = text.slice(analysisStart, hit.start);
          fixStart = hit.end;
          state = 'IN_FIX';
        }
        break;

      case 'SEEKING_FIX':
        if (hit.sentinel === SENTINELS.fixOpen) {
          fixStart = hit.end;
          state = 'IN_FIX';
        }
        break;

      case 'IN_FIX':
        if (hit.sentinel === SENTINELS.fixClose) {
          rawScript = text.slice(fixStart, hit.start);
          fixClosed = true;
          state = 'DONE';
        }
        break;
    }

    if (state === 'DONE') {
      break;
    }
  }

  if (state === 'IN_ANALYSIS') {
    // Truncated before any boundary; keep what arrived for display
    analysisText = text.slice(analysisStart);
  }

  // A fix region without its close is a truncated script and is never offered
  if (!fixClosed) {
    rawScript = '';
  }

  return {
    analysisText,
    rawScript,
    wellFormed: analysisSeen && analysisClosed && fixClosed
  };
}

export class ResponseParser {
  parse(responseText: ModelResponse): ParsedDiagnosis {
    return parseResponse(responseText);
  }
}
