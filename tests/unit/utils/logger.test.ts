import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger, describeError, type Logger } from '../../../src/utils/logger';

describe('Logger', () => {
  let logDir: string;
  let logger: Logger;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'crawler-logs-'));
    logger = createLogger('test', { logDir, level: 'debug' });
  });

  afterEach(() => {
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('should create a logger instance', () => {
    expect(logger.error).toBeDefined();
    expect(logger.warn).toBeDefined();
    expect(logger.info).toBeDefined();
    expect(logger.debug).toBeDefined();
  });

  it('should log at every level', () => {
    expect(() => logger.error('Test error message')).not.toThrow();
    expect(() => logger.warn('Test warning message')).not.toThrow();
    expect(() => logger.info('Test info message')).not.toThrow();
    expect(() => logger.debug('Test debug message')).not.toThrow();
  });

  it('should log with metadata', () => {
    expect(() => logger.info('Test message', { listingId: '123', marker: 1 })).not.toThrow();
  });

  it('should create the log directory when missing', () => {
    const nested = path.join(logDir, 'nested', 'logs');

    createLogger('test', { logDir: nested, correlationId: 'search:0123456789abcdef:results' });

    expect(fs.existsSync(nested)).toBe(true);
  });
});

describe('describeError', () => {
  it('should use the message of an Error', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
  });

  it('should stringify anything else', () => {
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
