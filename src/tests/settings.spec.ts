import { ComputationPipeline, createLogger, loadSettings } from '../index.ts';

const TIMESTAMP = '\\d{4}-\\d{2}-\\d{2} \\d{2}:\\d{2}:\\d{2}\\.\\d{3}';

describe('loadSettings', () => {
  it('defaults to info', () => {
    expect(loadSettings({})).toEqual({ logLevel: 'info' });
    expect(loadSettings({ LOG_LEVEL: '' })).toEqual({ logLevel: 'info' });
  });

  it('normalises the level name', () => {
    expect(loadSettings({ LOG_LEVEL: ' DEBUG ' })).toEqual({ logLevel: 'debug' });
    expect(loadSettings({ LOG_LEVEL: 'Warning' })).toEqual({ logLevel: 'warn' });
    expect(loadSettings({ LOG_LEVEL: 'error' })).toEqual({ logLevel: 'error' });
  });

  it('rejects unknown levels', () => {
    expect(() => loadSettings({ LOG_LEVEL: 'verbose' })).toThrow(
      /^Invalid environment configuration:\n/,
    );
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('filters below the configured level', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger('test');

    logger.info('hidden');
    logger.warn('careful', { attempt: 2 });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      expect.stringMatching(new RegExp(`^${TIMESTAMP} \\[WARN\\] \\[test\\] careful$`)),
      { attempt: 2 },
    );
  });

  it('picks up level changes between calls', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = createLogger();

    vi.stubEnv('LOG_LEVEL', 'info');
    logger.debug('first');
    vi.stubEnv('LOG_LEVEL', 'debug');
    logger.debug('second');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith(
      expect.stringMatching(new RegExp(`^${TIMESTAMP} \\[DEBUG\\] second$`)),
    );
  });

  it('treats an unknown level as info instead of throwing', () => {
    vi.stubEnv('LOG_LEVEL', 'trace');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = createLogger();

    logger.debug('hidden');
    logger.info('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);
    expect(new ComputationPipeline([['increment', (x: number) => x + 2]]).run(1)).toBe(3);
  });

  it('is what a pipeline logs to by default', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    new ComputationPipeline([['increment', (x: number) => x + 2]]).run(1);

    expect(debug).toHaveBeenCalledWith(
      expect.stringMatching(/\[DEBUG\] \[pipeline\] pipeline: step 1\/1 'increment'$/),
    );
  });
});
