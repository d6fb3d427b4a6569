import {
  LogEntry,
  LogLevel,
  createLogger,
  formatEntry,
  parseLogLevel,
  setLogHandler,
  setLogLevel,
  stderrHandler,
} from '../src/logger';

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    setLogHandler(stderrHandler);
    setLogLevel(LogLevel.Info);
  });

  test('child loggers carry their bound context', () => {
    const log = createLogger({ component: 'buildgate' }).child({ pipelineId: 'pl_1' }).child({ jobId: 'lint' });

    log.warn('slow step', { step: 'lint' });

    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe(LogLevel.Warn);
    expect(entries[0].message).toBe('slow step');
    expect(entries[0].context).toEqual({ component: 'buildgate', pipelineId: 'pl_1', jobId: 'lint', step: 'lint' });
  });

  test('entries below the level are dropped', () => {
    const log = createLogger();
    log.debug('hidden');
    setLogLevel(LogLevel.Error);
    log.warn('hidden too');
    log.error('shown');
    expect(entries.map((e) => e.message)).toEqual(['shown']);
  });

  test('formatEntry keeps error messages', () => {
    const line = formatEntry({
      level: LogLevel.Error,
      message: 'save failed',
      context: { error: new Error('disk full') },
      timestamp: '2026-01-01T00:00:00.000Z',
    });
    expect(line).toBe(
      '{"ts":"2026-01-01T00:00:00.000Z","level":"error","msg":"save failed","error":{"name":"Error","message":"disk full"}}',
    );
  });

  test('parseLogLevel accepts any case', () => {
    expect(parseLogLevel('WARN')).toBe(LogLevel.Warn);
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
