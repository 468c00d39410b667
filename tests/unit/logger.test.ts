import { createLogger, getLogLevel, setLogLevel, setLogSink, type TLogSink } from '../../src/utils/logger';

describe('logger', () => {
  let lines: string[];
  let previousSink: TLogSink;
  const previousLevel = getLogLevel();

  beforeEach(() => {
    lines = [];
    previousSink = setLogSink((level, line) => lines.push(`${level} ${line}`));
  });

  afterEach(() => {
    setLogSink(previousSink);
    setLogLevel(previousLevel);
  });

  it('should prefix lines with the namespace', () => {
    setLogLevel('debug');
    createLogger('loader').info('loaded');
    expect(lines).toEqual(['info [loader] loaded']);
  });

  it('should drop messages below the current level', () => {
    setLogLevel('warn');
    const log = createLogger('parser');
    log.info('hidden');
    log.warn('shown');
    expect(lines).toEqual(['warn [parser] shown']);
    expect(log.isEnabled('info')).toBe(false);
    expect(log.isEnabled('error')).toBe(true);
  });

  it('should emit nothing when silent', () => {
    setLogLevel('silent');
    createLogger('x').error('nope');
    expect(lines).toEqual([]);
  });
});
