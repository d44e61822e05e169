import {
  enableProfiling,
  INSTRUMENTED_METHODS,
  PROFILING_KEYS,
  ProfilingConfiguration,
  QUERY_EXECUTION_MARKER,
} from './profiling-configuration';

describe('ProfilingConfiguration', () => {
  it('starts with no instrumented methods', () => {
    const config = new ProfilingConfiguration();

    expect(config.getMethods()).toEqual([]);
    expect(config.isEnabled(PROFILING_KEYS.TIME_DETAILS)).toBe(false);
  });

  it('accepts initial parameters', () => {
    const config = new ProfilingConfiguration({
      [PROFILING_KEYS.METHODS]: ['DebugPDO::commit', 42],
      [PROFILING_KEYS.MEMORY_DETAILS]: true,
    });

    expect(config.getMethods()).toEqual(['DebugPDO::commit']);
    expect(config.isEnabled(PROFILING_KEYS.MEMORY_DETAILS)).toBe(true);
  });

  it('treats only boolean true as enabled', () => {
    const config = new ProfilingConfiguration().setParameter(
      PROFILING_KEYS.TIME_DETAILS,
      'true',
    );

    expect(config.isEnabled(PROFILING_KEYS.TIME_DETAILS)).toBe(false);
  });

  it('returns the default only for keys that were never set', () => {
    const config = new ProfilingConfiguration().setParameter('debug.level', 0);

    expect(config.getParameter('debug.level', 3)).toBe(0);
    expect(config.getParameter('debug.missing', 3)).toBe(3);
    expect(config.getParameter('debug.missing')).toBeNull();
  });

  it('stores class map entries under classmap.<Type>', () => {
    const config = new ProfilingConfiguration()
      .registerClass('Book', 'src/models/Book.ts')
      .registerClass('Author', 'src/models/Author.ts');

    expect(config.getFlatParameters()).toEqual({
      'classmap.Book': 'src/models/Book.ts',
      'classmap.Author': 'src/models/Author.ts',
    });
  });

  it('returns a frozen copy of the parameters', () => {
    const config = new ProfilingConfiguration().registerClass('Book', 'b.ts');
    const flat = config.getFlatParameters();

    config.registerClass('Author', 'a.ts');

    expect(Object.isFrozen(flat)).toBe(true);
    expect(Object.keys(flat)).toEqual(['classmap.Book']);
  });
});

describe('enableProfiling', () => {
  it('turns on every detail and instruments all operations', () => {
    const config = enableProfiling(new ProfilingConfiguration());

    expect(config.isEnabled(PROFILING_KEYS.METHOD_DETAILS)).toBe(true);
    expect(config.isEnabled(PROFILING_KEYS.TIME_DETAILS)).toBe(true);
    expect(config.isEnabled(PROFILING_KEYS.MEMORY_DETAILS)).toBe(true);
    expect(config.getMethods()).toEqual([...INSTRUMENTED_METHODS]);
    expect(config.getMethods()).toHaveLength(8);
    expect(config.getMethods()).toContain(QUERY_EXECUTION_MARKER);
  });

  it('is idempotent and keeps class map entries', () => {
    const config = new ProfilingConfiguration().registerClass('Book', 'b.ts');

    enableProfiling(config);
    const once = config.getFlatParameters();
    enableProfiling(config);

    expect(config.getFlatParameters()).toEqual(once);
    expect(once['classmap.Book']).toBe('b.ts');
  });
});
