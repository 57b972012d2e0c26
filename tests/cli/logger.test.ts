import { describe, it, expect, afterEach } from 'vitest';
import os from 'os';
import path from 'path';
import winston from 'winston';
import {
  createLogger,
  createSilentLogger,
  getLogger,
  initLogger,
  isLogLevel,
} from '../../src/cli/logger.js';

function render(logger: winston.Logger, level: string, message: string): unknown {
  const transport = logger.transports[0];
  const formatted = transport.format?.transform({ level, message, timestamp: '00:00:00' });
  return typeof formatted === 'object' ? Reflect.get(formatted, Symbol.for('message')) : undefined;
}

describe('CLI logger', () => {
  afterEach(() => {
    delete process.env.CODEMIGRATE_LOG_LEVEL;
  });

  it('creates logger with debug level when verbose', () => {
    const logger = createLogger({ verbose: true, noColor: true });
    expect(logger.level).toBe('debug');
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it('formats plain lines without color', () => {
    const logger = createLogger({ level: 'warn', noColor: true });
    expect(logger.level).toBe('warn');
    expect(render(logger, 'warn', 'disk almost full')).toBe('[00:00:00] WARN: disk almost full');
  });

  it('reads the level from CODEMIGRATE_LOG_LEVEL', () => {
    process.env.CODEMIGRATE_LOG_LEVEL = 'error';
    expect(createLogger().level).toBe('error');

    process.env.CODEMIGRATE_LOG_LEVEL = 'loud';
    expect(createLogger().level).toBe('info');
  });

  it('adds a file transport and can drop the console', () => {
    const logger = createLogger({
      filePath: path.join(os.tmpdir(), 'codemigrate-logger-test.log'),
      consoleOutput: false,
    });

    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.File);
  });

  it('creates a silent logger', () => {
    expect(createSilentLogger().silent).toBe(true);
    expect(createLogger({ consoleOutput: false }).silent).toBe(true);
  });

  it('validates level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });

  it('initializes and reuses global logger', () => {
    const first = initLogger({ level: 'error' });
    expect(getLogger()).toBe(first);
  });
});
