/**
 * @fileoverview Unit tests for Logger
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { v4 as uuidv4 } from 'uuid';
import { ConsoleTransport, Logger, MemoryTransport, createLogger } from './logger.js';
import type { LogEntry } from './logger.js';
import { Severity, createTimestamp, createUniqueId } from '../types/index.js';

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
    it('should write each level with its message and data', () => {
      logger.debug('debug message', { key: 'value' });
      logger.info('info message');
      logger.warn('warn message');
      logger.error('error message');
      logger.fatal('fatal message');

      const entries = memoryTransport.getEntries();
      expect(entries.map(e => e.level)).toEqual([
        Severity.DEBUG, Severity.INFO, Severity.WARN, Severity.ERROR, Severity.FATAL,
      ]);
      expect(entries[0]?.message).toBe('debug message');
      expect(entries[0]?.data).toEqual({ key: 'value' });
      expect(entries[1]?.data).toEqual({});
    });

    it('should drop entries below the minimum level', () => {
      const quiet = new Logger({ minLevel: Severity.WARN, transports: [memoryTransport] });

      quiet.debug('hidden');
      quiet.info('hidden');
      quiet.warn('shown');

      expect(memoryTransport.getEntries()).toHaveLength(1);
      expect(quiet.isLevelEnabled(Severity.INFO)).toBe(false);
    });

    it('should capture error details', () => {
      const error = Object.assign(new Error('disk full'), { code: 'ENOSPC' });

      logger.error('write failed', {}, error);

      expect(memoryTransport.getEntries()[0]?.error).toMatchObject({
        name: 'Error',
        message: 'disk full',
        code: 'ENOSPC',
      });
    });
  });

  describe('child()', () => {
    it('should tag entries with the pursuit id and share transports', () => {
      const pursuitId = createUniqueId(uuidv4());
      const child = logger.child({ module: 'agent.loop', pursuitId });

      child.info('started');
      logger.info('unrelated');

      const tagged = memoryTransport.findByPursuitId(pursuitId);
      expect(tagged).toHaveLength(1);
      expect(tagged[0]?.module).toBe('agent.loop');
      expect(memoryTransport.getEntries()[1]?.pursuitId).toBeNull();
    });
  });

  describe('time()', () => {
    it('should log the duration of a successful operation', async () => {
      const value = await logger.time('lookup', () => Promise.resolve(5));

      expect(value).toBe(5);
      const [entry] = memoryTransport.getEntries();
      expect(entry?.message).toBe('lookup completed');
      expect(entry?.metrics?.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should log and rethrow a failure', async () => {
      await expect(logger.time('lookup', () => Promise.reject(new Error('gone')))).rejects.toThrow('gone');

      const [entry] = memoryTransport.getEntries();
      expect(entry?.level).toBe(Severity.ERROR);
      expect(entry?.message).toBe('lookup failed');
      expect(entry?.error?.message).toBe('gone');
    });
  });

  describe('transports', () => {
    it('should keep logging when a transport throws', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const broken = { name: 'broken', write: () => { throw new Error('nope'); } };
      const resilient = new Logger({ transports: [broken, memoryTransport] });

      resilient.info('still here');

      expect(memoryTransport.getEntries()).toHaveLength(1);
      expect(consoleError).toHaveBeenCalledWith("Logger transport 'broken' failed:", expect.any(Error));
      consoleError.mockRestore();
    });

    it('should trim the memory transport to its capacity', () => {
      const small = new MemoryTransport(2);
      const limited = createLogger('limited', { transports: [small] });

      limited.info('one');
      limited.info('two');
      limited.info('three');

      expect(small.getEntries().map(e => e.message)).toEqual(['two', 'three']);
      expect(small.findByLevel(Severity.INFO)).toHaveLength(2);
    });
  });
});

describe('ConsoleTransport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write a plain line to stderr without colors', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const entry: LogEntry = {
      id: createUniqueId('entry-1'),
      timestamp: createTimestamp(Date.UTC(2026, 0, 2, 3, 4, 5)),
      level: Severity.INFO,
      message: 'Pursuit started',
      module: 'agent.loop',
      pursuitId: createUniqueId('1234567890abcdef'),
      data: { maxIterations: 3 },
      error: null,
      metrics: null,
    };

    new ConsoleTransport(false).write(entry);

    expect(consoleError).toHaveBeenCalledWith(
      '2026-01-02T03:04:05.000Z INFO  [agent.loop:12345678] Pursuit started {"maxIterations":3}',
    );
  });
});
