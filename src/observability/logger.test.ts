/**
 * @fileoverview Unit tests for Logger
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Logger, ConsoleTransport, MemoryTransport, parseSeverity } from './logger.js';
import { Severity, createUniqueId } from '../types/index.js';
import { v4 as uuidv4 } from 'uuid';

describe('Logger', () => {
  let memoryTransport: MemoryTransport;
  let logger: Logger;

  beforeEach(() => {
    memoryTransport = new MemoryTransport(100);
    logger = new Logger({
      minLevel: Severity.DEBUG,
      transports: [memoryTransport],
      module: 'test',
    });
  });

  describe('logging levels', () => {
    it('should log DEBUG messages', () => {
      logger.debug('debug message', { key: 'value' });

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe(Severity.DEBUG);
      expect(entries[0].message).toBe('debug message');
      expect(entries[0].data).toEqual({ key: 'value' });
    });

    it('should log ERROR messages with error object', () => {
      logger.error('error message', {}, new Error('test error'));

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].error?.message).toBe('test error');
    });
  });

  describe('level filtering', () => {
    it('should filter messages below minimum level', () => {
      const warnLogger = new Logger({
        minLevel: Severity.WARN,
        transports: [memoryTransport],
        module: 'test',
      });

      warnLogger.debug('debug');
      warnLogger.info('info');
      warnLogger.warn('warn');
      warnLogger.error('error');

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(2);
      expect(entries[0].level).toBe(Severity.WARN);
      expect(entries[1].level).toBe(Severity.ERROR);
    });
  });

  describe('child loggers', () => {
    it('should inherit transports and carry the new module name', () => {
      const child = logger.child({ module: 'submodule' });
      child.info('message');

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].module).toBe('submodule');
    });

    it('should carry the correlation id into the child', () => {
      const correlationId = createUniqueId(uuidv4());
      logger.child({ correlationId }).info('correlated');

      expect(memoryTransport.findByCorrelationId(correlationId)).toHaveLength(1);
    });
  });

  describe('time()', () => {
    it('should record the duration of a successful operation', async () => {
      const value = await logger.time('lookup', async () => 7);

      expect(value).toBe(7);
      const entries = memoryTransport.getEntries();
      expect(entries[0].message).toBe('lookup completed');
      expect(entries[0].metrics?.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should log and rethrow failures', async () => {
      await expect(
        logger.time('lookup', async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      const entries = memoryTransport.findByLevel(Severity.ERROR);
      expect(entries).toHaveLength(1);
      expect(entries[0].message).toBe('lookup failed');
      expect(entries[0].error?.message).toBe('boom');
    });
  });

  describe('MemoryTransport', () => {
    it('should respect max entries limit', () => {
      const smallTransport = new MemoryTransport(3);
      const smallLogger = new Logger({
        minLevel: Severity.DEBUG,
        transports: [smallTransport],
        module: 'test',
      });

      smallLogger.info('message 1');
      smallLogger.info('message 2');
      smallLogger.info('message 3');
      smallLogger.info('message 4');

      const entries = smallTransport.getEntries();
      expect(entries).toHaveLength(3);
      expect(entries[0].message).toBe('message 2');
      expect(entries[2].message).toBe('message 4');
    });
  });

  describe('ConsoleTransport', () => {
    it('should write one uncoloured line with data', () => {
      const output = vi.fn();
      const consoleLogger = new Logger({
        minLevel: Severity.INFO,
        transports: [new ConsoleTransport(false, output)],
        module: 'agent.loop',
      });

      consoleLogger.info('Step finished', { step: 2 });

      expect(output).toHaveBeenCalledTimes(1);
      const line = String(output.mock.calls[0][0]);
      expect(line.endsWith('INFO  [agent.loop] Step finished {"step":2}')).toBe(true);
    });
  });
});

describe('parseSeverity', () => {
  it('should accept any casing', () => {
    expect(parseSeverity('warn')).toBe(Severity.WARN);
    expect(parseSeverity(' Debug ')).toBe(Severity.DEBUG);
  });

  it('should reject unknown names', () => {
    expect(parseSeverity('verbose')).toBeNull();
  });
});
