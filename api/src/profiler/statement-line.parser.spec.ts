import { parseStatementLine } from './statement-line.parser';

describe('parseStatementLine', () => {
  it('parses a prepared statement line', () => {
    expect(
      parseStatementLine(
        'DebugPDOStatement::execute|0.0123 sec|1.50 KB|  SELECT * FROM t  ',
      ),
    ).toEqual({ sql: 'SELECT * FROM t', duration: 0.0123, memory: 1536 });
  });

  it('parses lines written with spaced separators', () => {
    expect(
      parseStatementLine(
        'DebugPDOStatement::execute | 1.25 sec | 2.5 MB |  SELECT 1  ',
      ),
    ).toEqual({ sql: 'SELECT 1', duration: 1.25, memory: 2621440 });
  });

  describe('memory units', () => {
    const memoryOf = (segment: string) =>
      parseStatementLine(`m|0.1 sec|${segment}|SELECT 1`).memory;

    it('scales KB and MB', () => {
      expect(memoryOf('10 KB')).toBe(10240);
      expect(memoryOf('2 MB')).toBe(2097152);
    });

    it('leaves bytes and unknown units unscaled', () => {
      expect(memoryOf('512')).toBe(512);
      expect(memoryOf('512 B')).toBe(512);
      expect(memoryOf('1.50 GB')).toBe(1.5);
    });

    it('reads 0 when the segment has no number', () => {
      expect(memoryOf('n/a')).toBe(0);
    });
  });

  it('needs a decimal number for the duration', () => {
    expect(parseStatementLine('m|12 sec|1 KB|SELECT 1').duration).toBe(0);
  });

  it('takes the first decimal in the duration segment', () => {
    expect(parseStatementLine('m|0.5 sec (1.25)|1 KB|SELECT 1').duration).toBe(
      0.5,
    );
  });

  it('keeps pipes that are part of the SQL', () => {
    expect(
      parseStatementLine("m|0.1 sec|1 KB| SELECT a || '-' || b FROM t").sql,
    ).toBe("SELECT a || '-' || b FROM t");
  });

  it('degrades to zero values for malformed lines', () => {
    expect(parseStatementLine('DebugPDOStatement::execute')).toEqual({
      sql: '',
      duration: 0,
      memory: 0,
    });
    expect(parseStatementLine('m|x|y|')).toEqual({
      sql: '',
      duration: 0,
      memory: 0,
    });
  });
});
