import { GCodeTokenizer } from './GCodeTokenizer';

describe('GCodeTokenizer', () => {
  let tokenizer: GCodeTokenizer;

  beforeEach(() => {
    tokenizer = new GCodeTokenizer();
  });

  test('should split a line into address/value tokens', () => {
    const { line, diagnostics } = tokenizer.tokenize('G01 X10.5 Y-2 Z.5 F500 ; rough pass', 3);

    expect(diagnostics).toEqual([]);
    expect(line.lineNumber).toBe(3);
    expect(line.tokens).toEqual([
      { letter: 'G', value: 1, raw: 'G01', kind: 'command' },
      { letter: 'X', value: 10.5, raw: 'X10.5', kind: 'axis' },
      { letter: 'Y', value: -2, raw: 'Y-2', kind: 'axis' },
      { letter: 'Z', value: 0.5, raw: 'Z.5', kind: 'axis' },
      { letter: 'F', value: 500, raw: 'F500', kind: 'parameter' }
    ]);
  });

  test('should read words written without spaces and in lower case', () => {
    const { line } = tokenizer.tokenize('g1x10y5', 1);

    expect(line.tokens.map(token => token.raw)).toEqual(['G1', 'X10', 'Y5']);
  });

  test('should drop parenthesized comments', () => {
    const { line } = tokenizer.tokenize('(setup) G0 Z5 (clear', 1);

    expect(line.tokens.map(token => token.raw)).toEqual(['G0', 'Z5']);
  });

  test('should ignore blank lines and program delimiters', () => {
    expect(tokenizer.tokenize('   ', 1).line.tokens).toHaveLength(0);
    expect(tokenizer.tokenize('%', 2).line.tokens).toHaveLength(0);
    expect(tokenizer.tokenize('; only a comment', 3).line.tokens).toHaveLength(0);
  });

  test('should keep unknown letters as unknown tokens', () => {
    const { line, diagnostics } = tokenizer.tokenize('G1 X10 Q5', 1);

    expect(diagnostics).toEqual([]);
    expect(line.tokens[2]).toEqual({ letter: 'Q', value: 5, raw: 'Q5', kind: 'unknown' });
  });

  test('should read the repeat count of a subprogram call', () => {
    const { line } = tokenizer.tokenize('M98 P2000 L3', 1);

    expect(line.tokens[2]).toEqual({ letter: 'L', value: 3, raw: 'L3', kind: 'parameter' });
  });

  test('should accept a bare program marker', () => {
    const { line, diagnostics } = tokenizer.tokenize('O', 1);

    expect(diagnostics).toEqual([]);
    expect(line.tokens).toEqual([{ letter: 'O', value: undefined, raw: 'O', kind: 'program' }]);
  });

  test('should report a letter without a value and keep the rest of the line', () => {
    const { line, diagnostics } = tokenizer.tokenize('G1 X Y10', 7);

    expect(line.tokens.map(token => token.raw)).toEqual(['G1', 'Y10']);
    expect(diagnostics).toEqual([{
      severity: 'error',
      message: 'Malformed coordinate/command: "X"',
      line: 7,
      code: 'G1 X Y10'
    }]);
  });

  test('should report malformed numeric text once per chunk', () => {
    const { line, diagnostics } = tokenizer.tokenize('X10.5.3', 2);

    expect(line.tokens.map(token => token.raw)).toEqual(['X10.5']);
    expect(diagnostics.map(d => d.message)).toEqual(['Malformed coordinate/command: ".3"']);
  });

  test('should report a word that is not G-code at all', () => {
    const { line, diagnostics } = tokenizer.tokenize('INVALID_COMMAND', 4);

    expect(line.tokens).toHaveLength(0);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].message).toBe('Malformed coordinate/command: "INVALID_COMMAND"');
  });

  test('should strip the block delete marker and carriage returns', () => {
    const { line } = tokenizer.tokenize('/G0 X5\r', 1);

    expect(line.original).toBe('/G0 X5');
    expect(line.tokens.map(token => token.raw)).toEqual(['G0', 'X5']);
  });
});
