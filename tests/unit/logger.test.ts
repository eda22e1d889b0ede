import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Writable } from 'node:stream';
import { configureLogger, getLogger, Logger, parseLogFormat, parseLogLevel } from '../../src/common/logger';

class MemoryWritable extends Writable {
  chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
    this.chunks.push(chunk.toString());
    callback();
  }
}

describe('Logger', () => {
  let destination: MemoryWritable;
  let logger: Logger;

  beforeEach(() => {
    destination = new MemoryWritable();
    logger = new Logger({ destination, level: 'debug', format: 'text' });
  });

  afterEach(() => {
    configureLogger({ level: 'info', format: 'text', destination: process.stderr });
  });

  it('respects log levels', () => {
    logger.configure({ level: 'warn' });
    logger.info('should be filtered');
    logger.warn('should be emitted');
    expect(destination.chunks.length).toBe(1);
    expect(destination.chunks[0]).toMatch(/ WARN should be emitted\n$/);
  });

  it('emits json payload', () => {
    logger.configure({ format: 'json' });
    logger.debug('payload', { variations: 8 });
    const payload = JSON.parse(destination.chunks[0]);
    expect(payload.level).toBe('debug');
    expect(payload.message).toBe('payload');
    expect(payload.variations).toBe(8);
  });

  it('creates scoped children', () => {
    logger.child('cli').child('check').info('hello');
    expect(destination.chunks[0]).toMatch(/ INFO \[cli:check\] hello\n$/);
  });

  it('reconfigures scoped loggers handed out earlier', () => {
    const scoped = getLogger('logger-test');
    configureLogger({ level: 'debug', destination });
    scoped.debug('late');
    expect(getLogger('logger-test')).toBe(scoped);
    expect(destination.chunks.join('')).toContain('[logger-test] late');
  });

  it('parses level and format names', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(undefined)).toBeUndefined();
    expect(parseLogFormat('json')).toBe('json');
    expect(() => parseLogLevel('loud')).toThrow(/Unsupported log level "loud"/);
    expect(() => parseLogFormat('xml')).toThrow(/Unsupported log format "xml"/);
  });
});
