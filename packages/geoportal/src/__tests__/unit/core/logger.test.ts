/**
 * Logger Tests
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  Logger,
  createLogger,
  parseLogLevel,
  type LogLevel,
  type LoggerOptions,
} from '../../../core/utils/logger.js';

interface Captured {
  readonly level: LogLevel;
  readonly line: string;
}

function capturingLogger(options: Omit<LoggerOptions, 'sink'>): { log: Logger; lines: Captured[] } {
  const lines: Captured[] = [];
  const log = new Logger({ ...options, sink: (level, line) => lines.push({ level, line }) });
  return { log, lines };
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes a pretty line with metadata', () => {
    const { log, lines } = capturingLogger({ level: 'info', service: 'geoportal:test', format: 'pretty' });

    log.info('Upload ingested', { featureCount: 2 });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.level).toBe('info');
    expect(lines[0]?.line).toMatch(/^\[\S+\] INFO geoportal:test: Upload ingested \{"featureCount":2\}$/);
  });

  it('writes JSON lines', () => {
    const { log, lines } = capturingLogger({ level: 'info', service: 'geoportal:test', format: 'json' });

    log.warn('Upload rejected', { kind: 'UnsupportedFormat' });

    expect(JSON.parse(lines[0]?.line ?? '')).toMatchObject({
      level: 'warn',
      service: 'geoportal:test',
      message: 'Upload rejected',
      kind: 'UnsupportedFormat',
    });
  });

  it('drops messages below its level', () => {
    const { log, lines } = capturingLogger({ level: 'warn', service: 'geoportal:test', format: 'pretty' });

    log.debug('hidden');
    log.info('hidden');
    log.error('shown');

    expect(lines.map((entry) => entry.level)).toEqual(['error']);
    expect(log.isLevelEnabled('warn')).toBe(true);
    expect(log.isLevelEnabled('info')).toBe(false);
  });

  it('merges child bindings into every line', () => {
    const { log, lines } = capturingLogger({
      level: 'debug',
      service: 'geoportal:test',
      format: 'json',
      bindings: { module: 'pipeline' },
    });

    log.child({ scratchId: 'abc' }).debug('Upload resolved', { driver: 'GeoJSON' });

    expect(JSON.parse(lines[0]?.line ?? '')).toMatchObject({
      module: 'pipeline',
      scratchId: 'abc',
      driver: 'GeoJSON',
    });
  });

  it('writes to the console method of the level by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = new Logger({ level: 'info', service: 'geoportal:test', format: 'pretty' });

    log.warn('careful');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/ WARN geoportal:test: careful$/);
  });

  it('names module loggers after their module', () => {
    expect(createLogger({ module: 'pipeline' }).service).toBe('geoportal:pipeline');
  });
});

describe('parseLogLevel', () => {
  it('accepts levels in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe('debug');
    expect(parseLogLevel(' warn ')).toBe('warn');
  });

  it('ignores unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel('toString')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
