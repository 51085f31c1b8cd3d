import { ResponseParser, parseResponse } from '../src/ai/response-parser';
import { SENTINELS } from '../src/ai/response-contract';

const wrap = (analysis: string, fix: string): string =>
  `${SENTINELS.analysisOpen}${analysis}${SENTINELS.analysisClose}\n${SENTINELS.fixOpen}${fix}${SENTINELS.fixClose}`;

describe('ResponseParser - well-formed responses', () => {
  it('extracts both sections and discards surrounding text', () => {
    const text = `Sure! ${wrap('<p>Disk full</p>', 'Write-Host "x"')} Hope this helps.`;
    expect(parseResponse(text)).toEqual({
      analysisText: '<p>Disk full</p>',
      rawScript: 'Write-Host "x"',
      wellFormed: true
    });
  });

  it('returns bodies exactly as enclosed, whitespace included', () => {
    const result = parseResponse(wrap('\n  a  \n', '\nb\n'));
    expect(result.analysisText).toBe('\n  a  \n');
    expect(result.rawScript).toBe('\nb\n');
  });

  it('round-trips bodies that contain no sentinels', () => {
    const bodies: Array<[string, string]> = [
      ['', ''],
      ['<h3>Report</h3>', 'Get-Service -Name Spooler'],
      ['brackets [like] these', 'if ($x) { [int]$y = 1 }']
    ];
    for (const [analysis, fix] of bodies) {
      const result = parseResponse(wrap(analysis, fix));
      expect(result.analysisText).toBe(analysis);
      expect(result.rawScript).toBe(fix);
      expect(result.wellFormed).toBe(true);
    }
  });

  it('uses the first occurrence and ignores later duplicates', () => {
    const text = wrap('first', 'fix1') + wrap('second', 'fix2');
    const result = parseResponse(text);
    expect(result.analysisText).toBe('first');
    expect(result.rawScript).toBe('fix1');
  });

  it('treats a repeated opening sentinel inside a region as text', () => {
    const text = `${SENTINELS.analysisOpen}a ${SENTINELS.analysisOpen} b${SENTINELS.analysisClose}${SENTINELS.fixOpen}f${SENTINELS.fixClose}`;
    expect(parseResponse(text).analysisText).toBe(`a ${SENTINELS.analysisOpen} b`);
  });

  it('ignores closing sentinels that appear before their opening', () => {
    const text = `${SENTINELS.fixClose}${SENTINELS.analysisClose}${wrap('a', 'b')}`;
    expect(parseResponse(text)).toEqual({ analysisText: 'a', rawScript: 'b', wellFormed: true });
  });
});

describe('ResponseParser - malformed responses', () => {
  it('handles an empty response', () => {
    expect(parseResponse('')).toEqual({ analysisText: '', rawScript: '', wellFormed: false });
  });

  it('handles text with no sentinels at all', () => {
    expect(parseResponse('I cannot help with that.')).toEqual({ analysisText: '', rawScript: '', wellFormed: false });
  });

  it('drops a fix region that is never closed', () => {
    const text = `${SENTINELS.analysisOpen}a${SENTINELS.analysisClose}${SENTINELS.fixOpen}Stop-Service -Name`;
    expect(parseResponse(text)).toEqual({ analysisText: 'a', rawScript: '', wellFormed: false });
  });

  it('ends an unclosed analysis where the fix begins', () => {
    const text = `${SENTINELS.analysisOpen}abc${SENTINELS.fixOpen}xyz${SENTINELS.fixClose}`;
    expect(parseResponse(text)).toEqual({ analysisText: 'abc', rawScript: 'xyz', wellFormed: false });
  });

  it('keeps a truncated analysis for display', () => {
    expect(parseResponse(`${SENTINELS.analysisOpen}partial`)).toEqual({
      analysisText: 'partial',
      rawScript: '',
      wellFormed: false
    });
  });

  it('accepts a fix-only response but marks it malformed', () => {
    expect(parseResponse(`${SENTINELS.fixOpen}xyz${SENTINELS.fixClose}`)).toEqual({
      analysisText: '',
      rawScript: 'xyz',
      wellFormed: false
    });
  });

  it('is exposed through the ResponseParser class', () => {
    expect(new ResponseParser().parse(wrap('a', 'b')).wellFormed).toBe(true);
  });
});
