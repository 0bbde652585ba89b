import pino from 'pino';
import { parseLogLevel, createLogger, type LogLevel } from './logger';

describe('parseLogLevel', () => {
  it('should return "info" when env value is undefined', () => {
    expect(parseLogLevel(undefined)).toBe('info');
  });

  it('should return "info" when env value is empty string', () => {
    expect(parseLogLevel('')).toBe('info');
  });

  it.each<[string, LogLevel]>([
    ['fatal', 'fatal'],
    ['error', 'error'],
    ['warn', 'warn'],
    ['info', 'info'],
    ['debug', 'debug'],
    ['trace', 'trace'],
    ['silent', 'silent'],
  ])('should return "%s" for input "%s"', (input, expected) => {
    expect(parseLogLevel(input)).toBe(expected);
  });

  it('should be case-insensitive and trim whitespace', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel('  Warn ')).toBe('warn');
  });

  it('should fall back for invalid values', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseLogLevel('critical', 'silent')).toBe('silent');
  });
});

describe('createLogger', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should default to silent under the test environment', () => {
    delete process.env.LOG_LEVEL;
    process.env.NODE_ENV = 'test';
    const log = createLogger({ pretty: false });
    expect(log.level).toBe('silent');
  });

  it('should default to info outside the test environment', () => {
    delete process.env.LOG_LEVEL;
    process.env.NODE_ENV = 'production';
    const log = createLogger({ pretty: false });
    expect(log.level).toBe('info');
  });

  it('should respect LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    const log = createLogger({ pretty: false });
    expect(log.level).toBe('warn');
  });

  it('should let the level option win over LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    const log = createLogger({ level: 'debug', pretty: false });
    expect(log.level).toBe('debug');
  });

  describe('destination', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should write to stderr by default', () => {
      const destination = jest.spyOn(pino, 'destination');
      createLogger({ pretty: false });
      expect(destination).toHaveBeenCalledWith(2);
    });

    it('should write to stdout when asked', () => {
      const destination = jest.spyOn(pino, 'destination');
      createLogger({ pretty: false, stream: 'stdout' });
      expect(destination).toHaveBeenCalledWith(1);
    });
  });
});
