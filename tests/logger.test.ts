/**
 * Logger Tests
 */

import { describe, it, expect } from 'vitest';
import { LogLevel, Logger, createStreamSink, formatLogEntry } from '../src/infrastructure/logger.js';
import type { LogEntry } from '../src/infrastructure/logger.js';

describe('Logger', () => {
  it('buffers every entry and forwards only those at or above the threshold', () => {
    const forwarded: LogEntry[] = [];
    const logger = new Logger({ sink: (entry) => forwarded.push(entry), threshold: 'warn' });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(logger.recent().map((e) => e.message)).toEqual(['d', 'i', 'w', 'e']);
    expect(forwarded.map((e) => e.level)).toEqual([LogLevel.WARN, LogLevel.ERROR]);
  });

  it('applies a new threshold to later entries', () => {
    const forwarded: string[] = [];
    const logger = new Logger({ sink: (entry) => forwarded.push(entry.message) });

    logger.debug('hidden');
    logger.setThreshold('debug');
    logger.debug('shown');

    expect(forwarded).toEqual(['shown']);
  });

  it('drops the oldest entries past maxEntries', () => {
    const logger = new Logger({ maxEntries: 2 });

    logger.info('one');
    logger.info('two');
    logger.info('three');

    expect(logger.recent().map((e) => e.message)).toEqual(['two', 'three']);
    expect(logger.recent(1).map((e) => e.message)).toEqual(['three']);
  });

  it('replays only the entries the threshold held back', () => {
    const forwarded: string[] = [];
    const logger = new Logger({ sink: (entry) => forwarded.push(entry.message) });

    logger.debug('loading config');
    logger.info('listing');
    logger.debug('pass failed at stage log');

    expect(logger.replayHeldBack()).toBe(2);
    expect(forwarded).toEqual(['listing', 'loading config', 'pass failed at stage log']);
    expect(logger.replayHeldBack()).toBe(0);
  });

  it('limits the replay to the most recent entries', () => {
    const forwarded: string[] = [];
    const logger = new Logger({ sink: (entry) => forwarded.push(entry.message), threshold: 'error' });

    logger.debug('old');
    logger.debug('new');

    logger.replayHeldBack(1);

    expect(forwarded).toEqual(['new']);
  });

  it('does not replay entries forwarded before the threshold was raised', () => {
    const forwarded: string[] = [];
    const logger = new Logger({ sink: (entry) => forwarded.push(entry.message) });

    logger.info('shown');
    logger.setThreshold('warn');
    logger.info('held');
    logger.replayHeldBack();

    expect(forwarded).toEqual(['shown', 'held']);
  });
});

describe('formatLogEntry', () => {
  const base: LogEntry = { timestamp: '2026-10-14T12:00:00.000Z', level: LogLevel.INFO, message: 'Synced in 4ms' };

  it('writes level, context and message', () => {
    expect(formatLogEntry({ ...base, context: 'ReviewService.sync' })).toBe('INFO [ReviewService.sync] Synced in 4ms');
    expect(formatLogEntry(base)).toBe('INFO Synced in 4ms');
  });

  it('appends the message of an attached error', () => {
    const entry: LogEntry = {
      ...base,
      level: LogLevel.ERROR,
      message: 'Handler error: review.sync',
      data: { code: 'HANDLER_ERROR', message: 'pull rejected' },
    };

    expect(formatLogEntry(entry)).toBe('ERROR Handler error: review.sync: pull rejected');
  });

  it('writes one line per entry to a stream', () => {
    const chunks: string[] = [];
    const logger = new Logger({ sink: createStreamSink({ write: (chunk: string) => chunks.push(chunk) }) });

    logger.warn('Telemetry disabled: locked', 'SqliteTelemetry');

    expect(chunks).toEqual(['WARN [SqliteTelemetry] Telemetry disabled: locked\n']);
  });
});
