/**
 * Tests for Structured Logger
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { logger, setLogLevel, getLogLevel, isLogLevel } from './logger.js';
import { createBridgeError } from './errors.js';

describe('Structured Logger', () => {
  const originalConsole = {
    debug: console.debug,
    log: console.log,
    warn: console.warn,
    error: console.error,
  };

  let capturedOutput: string[] = [];

  beforeEach(() => {
    capturedOutput = [];
    setLogLevel('debug');
    console.debug = vi.fn((msg: string) => capturedOutput.push(msg));
    console.log = vi.fn((msg: string) => capturedOutput.push(msg));
    console.warn = vi.fn((msg: string) => capturedOutput.push(msg));
    console.error = vi.fn((msg: string) => capturedOutput.push(msg));
  });

  afterEach(() => {
    console.debug = originalConsole.debug;
    console.log = originalConsole.log;
    console.warn = originalConsole.warn;
    console.error = originalConsole.error;
    setLogLevel('info');
  });

  it('should output valid JSON', () => {
    logger.info({ event: 'test_event' });

    expect(capturedOutput.length).toBe(1);
    expect(() => JSON.parse(capturedOutput[0])).not.toThrow();
  });

  it('should include timestamp in ISO format', () => {
    logger.info({ event: 'test_event' });

    const parsed = JSON.parse(capturedOutput[0]);
    expect(new Date(parsed.timestamp).toISOString()).toBe(parsed.timestamp);
  });

  it('should include level and event fields', () => {
    logger.warn({ event: 'test_event', channelId: 'C123' });

    const parsed = JSON.parse(capturedOutput[0]);
    expect(parsed.level).toBe('warn');
    expect(parsed.event).toBe('test_event');
    expect(parsed.channelId).toBe('C123');
  });

  it('should route levels to the matching console method', () => {
    logger.debug({ event: 'd' });
    logger.info({ event: 'i' });
    logger.warn({ event: 'w' });
    logger.error({ event: 'e' });

    expect(console.debug).toHaveBeenCalledTimes(1);
    expect(console.log).toHaveBeenCalledTimes(1);
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  describe('level threshold', () => {
    it('should drop lines below the active level', () => {
      setLogLevel('warn');

      logger.debug({ event: 'd' });
      logger.info({ event: 'i' });
      logger.warn({ event: 'w' });
      logger.error({ event: 'e' });

      expect(capturedOutput.map((line) => JSON.parse(line).event)).toEqual(['w', 'e']);
    });

    it('should report the active level', () => {
      setLogLevel('error');
      expect(getLogLevel()).toBe('error');
    });

    it('should recognize valid level names only', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('error')).toBe(true);
      expect(isLogLevel('verbose')).toBe(false);
      expect(isLogLevel('')).toBe(false);
      expect(isLogLevel(undefined)).toBe(false);
    });
  });

  describe('bridgeError', () => {
    it('should log code, message, recoverable flag and the cause stack', () => {
      const cause = new Error('socket hang up');
      const error = createBridgeError('AGENT_QUERY_FAILED', 'socket hang up', {
        cause,
        metadata: { attempt: 1 },
      });

      logger.bridgeError(error, { event: 'agent_query_failed', channelId: 'C1' });

      const parsed = JSON.parse(capturedOutput[0]);
      expect(parsed.level).toBe('error');
      expect(parsed.event).toBe('agent_query_failed');
      expect(parsed.channelId).toBe('C1');
      expect(parsed.errorCode).toBe('AGENT_QUERY_FAILED');
      expect(parsed.errorMessage).toBe('socket hang up');
      expect(parsed.recoverable).toBe(true);
      expect(parsed.stack).toBe(cause.stack);
      expect(parsed.metadata).toEqual({ attempt: 1 });
    });

    it('should fall back to the error own stack without a cause', () => {
      const error = createBridgeError('UNKNOWN_ERROR', 'boom');

      logger.bridgeError(error, { event: 'test' });

      const parsed = JSON.parse(capturedOutput[0]);
      expect(parsed.stack).toBe(error.stack);
    });
  });
});
