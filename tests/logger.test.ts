import {
  LogEntry,
  LogLevel,
  createLogger,
  getLogLevel,
  parseLogLevel,
  resetLogHandler,
  setLogHandler,
  setLogLevel,
} from '../src/logger';

describe('logger', () => {
  let entries: LogEntry[];
  let previousLevel: LogLevel;

  beforeEach(() => {
    entries = [];
    previousLevel = getLogLevel();
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    resetLogHandler();
    setLogLevel(previousLevel);
  });

  test('child loggers merge their context', () => {
    setLogLevel(LogLevel.Debug);
    createLogger({ component: 'executor' }).child({ runId: 'run_1' }).debug('Node executed', { nodeId: 'evaluate' });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: LogLevel.Debug,
      message: 'Node executed',
      context: { component: 'executor', runId: 'run_1', nodeId: 'evaluate' },
    });
  });

  test('entries below the minimum level are dropped', () => {
    setLogLevel(LogLevel.Warn);
    const log = createLogger();
    log.info('hidden');
    log.error('shown');
    expect(entries.map((entry) => entry.message)).toEqual(['shown']);
  });

  test('silent drops everything', () => {
    setLogLevel(LogLevel.Silent);
    createLogger().error('hidden');
    expect(entries).toEqual([]);
  });

  test('parseLogLevel', () => {
    expect(parseLogLevel(' WARN ')).toBe(LogLevel.Warn);
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });

  test('the default handler writes one JSON line to stderr', () => {
    resetLogHandler();
    setLogLevel(LogLevel.Info);
    const write = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    try {
      createLogger({ component: 'store' }).warn('Store rewritten', { location: 'state.json' });
      expect(write).toHaveBeenCalledTimes(1);
      const [line] = write.mock.calls[0];
      expect(typeof line).toBe('string');
      expect(String(line).endsWith('\n')).toBe(true);
      expect(JSON.parse(String(line))).toMatchObject({
        level: 'warn',
        msg: 'Store rewritten',
        component: 'store',
        location: 'state.json',
      });
    } finally {
      write.mockRestore();
    }
  });
});
