/**
 * Logger Tests
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import { Logger, createLogger, getLogLevel, parseLogLevel, setLogLevel, setLogTimestamps } from '../src/logger.ts';

describe('Logger', () => {
  afterEach(() => {
    setLogLevel('info');
    setLogTimestamps(true);
  });

  it('should follow the global level until given its own', () => {
    const logger = createLogger('engine');
    setLogLevel('warn');
    assert.strictEqual(logger.getLevel(), 'warn');
    logger.setLevel('debug');
    assert.strictEqual(logger.getLevel(), 'debug');
    assert.strictEqual(getLogLevel(), 'warn');
  });

  it('should gate levels', () => {
    const logger = new Logger('engine', { level: 'warn' });
    assert.strictEqual(logger.isEnabled('debug'), false);
    assert.strictEqual(logger.isEnabled('info'), false);
    assert.strictEqual(logger.isEnabled('warn'), true);
    assert.strictEqual(logger.isEnabled('error'), true);
  });

  it('should silence everything at silent', () => {
    const logger = new Logger('engine', { level: 'silent' });
    assert.strictEqual(logger.isEnabled('error'), false);
  });

  it('should format without timestamps', () => {
    const logger = new Logger('engine', { timestamps: false });
    assert.strictEqual(logger.format('info', 'gen 3'), 'INFO [engine] gen 3');
    assert.strictEqual(logger.format('warn', 'slow', { ms: 12 }), 'WARN [engine] slow {"ms":12}');
    assert.strictEqual(logger.format('error', 'bad', 7), 'ERROR [engine] bad 7');
  });

  it('should follow the global timestamp switch', () => {
    const logger = new Logger('runner');
    setLogTimestamps(false);
    assert.strictEqual(logger.format('info', 'done'), 'INFO [runner] done');
    setLogTimestamps(true);
    assert.match(logger.format('info', 'done'), /^\d{4}-\d{2}-\d{2}T\S+Z INFO \[runner\] done$/);
  });

  it('should name child loggers after the parent', () => {
    const child = new Logger('runner', { level: 'error' }).child('worker');
    assert.strictEqual(child.module, 'runner:worker');
    assert.strictEqual(child.getLevel(), 'error');
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels case-insensitively', () => {
    assert.strictEqual(parseLogLevel('DEBUG'), 'debug');
    assert.strictEqual(parseLogLevel(' warn '), 'warn');
    assert.strictEqual(parseLogLevel('Silent'), 'silent');
  });

  it('should return null for anything else', () => {
    assert.strictEqual(parseLogLevel('trace'), null);
    assert.strictEqual(parseLogLevel(''), null);
    assert.strictEqual(parseLogLevel('toString'), null);
  });
});
